/**
 * Binary Configuration
 * 
 * Centralized configuration for all external binary paths.
 * 
 * Priority order:
 * 1. Environment variables (e.g., FFMPEG_PATH)
 * 2. Custom binary folder (packages/core/binaries/<os>/)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/
const BINARY_ROOT = resolve(__dirname, '../../binaries');

function getOsFolder(): string {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

export type BinarySource = 'env' | 'bundled' | 'path';

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: BinarySource;
}

/**
 * All external programs the operation managers drive
 */
export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ytdl: BinaryConfig;
  pip: BinaryConfig;
  pacman: BinaryConfig;
}

function resolveBinaryPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv
): BinaryConfig {
  const envPath = env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  const customPath = join(BINARY_ROOT, getOsFolder(), name + getExeExt());
  if (existsSync(customPath)) {
    return { name, envVar, resolvedPath: customPath, source: 'bundled' };
  }

  // Bare name; the spawn fails with not-found if PATH has no such program
  return { name, envVar, resolvedPath: name, source: 'path' };
}

export function getBinariesConfig(
  env: NodeJS.ProcessEnv = process.env,
  ytdlName: string = 'yt-dlp'
): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', env),
    ytdl: resolveBinaryPath(ytdlName, 'YTDL_PATH', env),
    pip: resolveBinaryPath('pip3', 'PIP_PATH', env),
    pacman: resolveBinaryPath('pacman', 'PACMAN_PATH', env),
  };
}
