/**
 * CLI Session
 *
 * Loads the application config and the registry snapshot once per command,
 * and writes the snapshot back afterwards. `.env` is loaded by the entry
 * point, before any logger reads the environment.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import {
  loadConfig,
  loadRegistry,
  saveRegistry,
  type AppConfig,
  type MediaRegistry,
} from '@reelkeeper/core';
import { createFFmpegOptions, type FFmpegOptions } from '@reelkeeper/processing';

export interface Session {
  config: AppConfig;
  registry: MediaRegistry;
}

export async function openSession(): Promise<Session> {
  const config = loadConfig();
  const registry = await loadRegistry(config.registryFile, {
    dataDir: config.dataDir,
    thumbsSubDir: config.layout.thumbsSubDir,
    metadataSubDir: config.layout.metadataSubDir,
  });
  return { config, registry };
}

export async function saveSession(session: Session): Promise<void> {
  await saveRegistry(session.registry, session.config.registryFile);
}

// Recipe files are a JSON object of FFmpegOptions fields
const recipeFileSchema = z.record(z.unknown());

export async function loadRecipe(file: string | undefined): Promise<FFmpegOptions> {
  if (file === undefined) {
    return createFFmpegOptions();
  }
  const content = await readFile(file, 'utf-8');
  return createFFmpegOptions(recipeFileSchema.parse(JSON.parse(content)));
}

const dbidSchema = z.coerce.number().int().nonnegative();

/**
 * Parse database ids given on the command line
 */
export function parseDbids(values: readonly string[]): number[] {
  return values.map(value => dbidSchema.parse(value));
}
