/**
 * Registry snapshot
 *
 * JSON form of the registry used by the command-line front end between runs.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { ensureDir } from '@reelkeeper/utils';
import { ValidationError } from '../errors/index.js';
import type { MediaEntity } from '../types/media.js';
import { MediaRegistry, type RegistryLayout } from './mediaRegistry.js';

const dbidSchema = z.number().int().positive();

const videoSchema = z.object({
  kind: z.literal('video'),
  dbid: dbidSchema,
  name: z.string(),
  parentDbid: dbidSchema,
  source: z.string().nullable().default(null),
  fileName: z.string().nullable().default(null),
  fileExt: z.string().nullable().default(null),
  fileSize: z.number().nullable().default(null),
  dlFlag: z.boolean().default(false),
  newFlag: z.boolean().default(false),
  dummyFlag: z.boolean().default(false),
  dummyPath: z.string().nullable().default(null),
  stampList: z.array(z.object({
    start: z.string(),
    stop: z.string().nullable(),
    title: z.string().nullable(),
  })).default([]),
  sliceList: z.array(z.object({
    start: z.number().nonnegative(),
    stop: z.number().nonnegative().nullable(),
  })).default([]),
});

const containerFields = {
  dbid: dbidSchema,
  name: z.string().min(1),
  parentDbid: dbidSchema.nullable().default(null),
  childList: z.array(dbidSchema).default([]),
  masterDbid: dbidSchema,
  slaveDbidList: z.array(dbidSchema).default([]),
  privFlag: z.boolean().default(false),
  externalDir: z.string().nullable().default(null),
};

const entitySchema = z.discriminatedUnion('kind', [
  videoSchema,
  z.object({ kind: z.literal('channel'), source: z.string(), ...containerFields }),
  z.object({ kind: z.literal('playlist'), source: z.string(), ...containerFields }),
  z.object({ kind: z.literal('folder'), ...containerFields }),
]);

export const snapshotSchema = z.object({
  version: z.literal(1),
  roots: z.array(dbidSchema),
  entities: z.array(entitySchema),
});

export type RegistrySnapshot = z.infer<typeof snapshotSchema>;

export function toSnapshot(registry: MediaRegistry): RegistrySnapshot {
  return {
    version: 1,
    roots: registry.rootDbids(),
    entities: registry.entries(),
  };
}

export function fromSnapshot(data: unknown, layout: RegistryLayout): MediaRegistry {
  const parsed = snapshotSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `registry.${issue?.path.join('.') ?? ''}`,
      issue?.message ?? 'invalid snapshot'
    );
  }

  const registry = new MediaRegistry(layout);
  const roots = new Set(parsed.data.roots);
  for (const entity of parsed.data.entities) {
    const restored: MediaEntity = entity;
    registry.restore(restored, roots.has(entity.dbid));
  }
  return registry;
}

/**
 * Load a snapshot file; a missing file yields an empty registry
 */
export async function loadRegistry(file: string, layout: RegistryLayout): Promise<MediaRegistry> {
  let content: string;
  try {
    content = await readFile(file, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return new MediaRegistry(layout);
    }
    throw error;
  }
  return fromSnapshot(JSON.parse(content), layout);
}

export async function saveRegistry(registry: MediaRegistry, file: string): Promise<void> {
  await ensureDir(dirname(file));
  await writeFile(file, JSON.stringify(toSnapshot(registry), null, 2), 'utf8');
}
