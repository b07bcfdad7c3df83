/**
 * Update Manager
 *
 * Runs one installer: pip (or the downloader's own self-update) for the
 * downloader, pacman for FFmpeg on MSYS2 installs. Installer noise that does
 * not mean failure (pip deprecation notices, pacman dependency-cycle
 * warnings) is filtered out of the error tally.
 */

import {
  ReelkeeperError,
  SpawnFailedError,
  type AppConfig,
} from '@reelkeeper/core';
import { OperationManager, type ChildOutcome, type OperationContext } from './operationManager.js';

export type UpdateTarget = 'downloader' | 'ffmpeg';

export interface UpdateTally {
  successFlag: boolean;
  /** Version reported by the installer, when it reported one */
  installedVersion: string | null;
  errorCount: number;
  benignCount: number;
}

const FFMPEG_PACKAGE = 'mingw-w64-x86_64-ffmpeg';

const BENIGN_STDERR: readonly RegExp[] = [
  /DEPRECATION/,
  /You are using pip version/,
  /You should consider upgrading/,
  /^warning:/i,
];

const FAILURE_STDOUT: readonly RegExp[] = [
  /It looks like you installed/,
  /The script \S+ is installed/,
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function compileUpdateCommand(target: UpdateTarget, config: AppConfig): string[] {
  if (target === 'ffmpeg') {
    return [config.binaries.pacman.resolvedPath, '-S', FFMPEG_PACKAGE, '--noconfirm'];
  }

  const { packageName, strategy } = config.update;
  switch (strategy) {
    case 'pip':
      return [config.binaries.pip.resolvedPath, 'install', '--upgrade', packageName];
    case 'pip-user':
      return [config.binaries.pip.resolvedPath, 'install', '--upgrade', '--user', packageName];
    case 'self':
      return [config.binaries.ytdl.resolvedPath, '-U'];
  }
}

export function isBenignUpdateWarning(line: string): boolean {
  return BENIGN_STDERR.some(pattern => pattern.test(line));
}

export function isUpdateFailureNotice(line: string): boolean {
  return FAILURE_STDOUT.some(pattern => pattern.test(line));
}

/**
 * Version named by one line of installer output. The patterns are tried in
 * order; the first that matches wins.
 */
export function extractInstalledVersion(line: string, packageName: string): string | null {
  const pkg = escapeRegExp(packageName);
  const patterns = [
    /Requirement already (?:up-to-date|satisfied).*\(([\d.]+)\)\s*$/,
    new RegExp(`Successfully installed (?:.*\\s)?${pkg}-([\\d.]+)`),
    /is up to date \((?:\w+@)?([\d.]+)\)/,
    /Updated \S+ to (?:\w+@)?([\d.]+)/,
  ];

  for (const pattern of patterns) {
    const match = pattern.exec(line);
    if (match?.[1] !== undefined) {
      return match[1];
    }
  }
  return null;
}

export class UpdateManager extends OperationManager<UpdateTarget, UpdateTally> {
  constructor(context: OperationContext, target: UpdateTarget = 'downloader') {
    super(
      'update',
      context,
      [target],
      { successFlag: false, installedVersion: null, errorCount: 0, benignCount: 0 },
      context.config.intervals.subprocessMs
    );
  }

  protected override async processItem(target: UpdateTarget): Promise<void> {
    this.writeInfo(
      target === 'ffmpeg'
        ? 'Starting update operation, installing/updating FFmpeg'
        : `Starting update operation, installing/updating ${this.config.update.packageName}`
    );

    const packageName = target === 'ffmpeg' ? FFMPEG_PACKAGE : this.config.update.packageName;
    let outcome: ChildOutcome;
    try {
      outcome = await this.runChild(compileUpdateCommand(target, this.config), {
        stdout: line => this.handleStdout(line, packageName),
        stderr: line => this.handleStderr(line),
      });
    } catch (error) {
      if (error instanceof SpawnFailedError) {
        // Nothing else to do without an installer
        throw new ReelkeeperError(error.message, error.code, true, error.details);
      }
      throw error;
    }

    if (outcome.killed) return;
    if (outcome.exitCode !== 0 && this.tally.errorCount === 0) {
      this.tally.errorCount++;
      this.writeError(outcome.lastError || `Installer exited with code ${outcome.exitCode}`);
    }
    this.tally.successFlag = outcome.exitCode === 0 && this.tally.errorCount === 0;
  }

  protected override describeItem(target: UpdateTarget): string {
    return target;
  }

  protected override summarise(): string[] {
    if (!this.tally.successFlag) {
      return ['Update failed'];
    }
    return this.tally.installedVersion === null
      ? ['Update succeeded']
      : [`Update succeeded, installed version: ${this.tally.installedVersion}`];
  }

  private handleStdout(line: string, packageName: string): void {
    const text = line.trim();
    if (text === '') return;

    if (isUpdateFailureNotice(text)) {
      this.tally.errorCount++;
      this.writeError(text);
      return;
    }

    this.tally.installedVersion ??= extractInstalledVersion(text, packageName);
    this.writeInfo(text);
  }

  private handleStderr(line: string): void {
    const text = line.trim();
    if (text === '') return;

    if (isBenignUpdateWarning(text)) {
      this.tally.benignCount++;
      this.logger.debug({ line: text }, 'Ignoring installer warning');
      return;
    }

    this.tally.errorCount++;
    this.writeError(text);
  }
}
