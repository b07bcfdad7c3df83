/**
 * Application Configuration
 *
 * Parsed once from the environment into an immutable object that is passed
 * by reference to every manager.
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { getBinariesConfig, type BinariesConfig } from './binaries.js';

const numberFromEnv = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

export const envSchema = z.object({
  // Read by the logger itself; checked here so a bad value fails at startup
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Archive layout
  REELKEEPER_DATA_DIR: z.string().min(1).default('./archive'),
  REELKEEPER_REGISTRY_FILE: z.string().min(1).optional(),
  THUMBS_SUB_DIR: z.string().min(1).default('.thumbs'),
  METADATA_SUB_DIR: z.string().min(1).default('.data'),
  CLIP_GENERIC_TITLE: z.string().min(1).default('clip'),

  // Loop pacing
  RECONCILE_INTERVAL_MS: numberFromEnv('250'),
  SUBPROCESS_INTERVAL_MS: numberFromEnv('100'),
  PROBE_TIMEOUT_MS: numberFromEnv('30000'),

  // Downloader
  YTDL_NAME: z.string().min(1).default('yt-dlp'),
  YTDL_PACKAGE: z.string().min(1).default('yt-dlp'),
  YTDL_UPDATE_STRATEGY: z.enum(['pip', 'pip-user', 'self']).default('pip'),
});

export type UpdateStrategy = z.infer<typeof envSchema>['YTDL_UPDATE_STRATEGY'];

export interface AppConfig {
  readonly dataDir: string;
  readonly registryFile: string;
  readonly binaries: Readonly<BinariesConfig>;
  readonly layout: {
    readonly thumbsSubDir: string;
    readonly metadataSubDir: string;
    readonly archiveFileName: string;
  };
  readonly intervals: {
    readonly reconcileMs: number;
    readonly subprocessMs: number;
  };
  readonly probeTimeoutMs: number;
  readonly splitVideoGenericTitle: string;
  readonly update: {
    readonly packageName: string;
    readonly strategy: UpdateStrategy;
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Build the configuration from an environment map.
 * Throws ValidationError naming the first offending variable.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      issue?.path.join('.') || 'environment',
      issue?.message ?? 'invalid configuration'
    );
  }

  const e = parsed.data;
  const dataDir = resolve(cwd, e.REELKEEPER_DATA_DIR);

  return deepFreeze({
    dataDir,
    registryFile: resolve(cwd, e.REELKEEPER_REGISTRY_FILE ?? resolve(dataDir, 'registry.json')),
    binaries: getBinariesConfig(env, e.YTDL_NAME),
    layout: {
      thumbsSubDir: e.THUMBS_SUB_DIR,
      metadataSubDir: e.METADATA_SUB_DIR,
      archiveFileName: 'ytdl-archive.txt',
    },
    intervals: {
      reconcileMs: e.RECONCILE_INTERVAL_MS,
      subprocessMs: e.SUBPROCESS_INTERVAL_MS,
    },
    probeTimeoutMs: e.PROBE_TIMEOUT_MS,
    splitVideoGenericTitle: e.CLIP_GENERIC_TITLE,
    update: {
      packageName: e.YTDL_PACKAGE,
      strategy: e.YTDL_UPDATE_STRATEGY,
    },
  });
}
