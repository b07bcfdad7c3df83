/**
 * Corruption Probe
 *
 * Decodes a whole file with FFmpeg, discarding the output. A decode that
 * does not finish within the timeout is reported as 'timeout' (treated as
 * possibly corrupt); the decoder is killed rather than left running.
 */

import { ProbeTimeoutError, SpawnFailedError } from '@reelkeeper/core';
import { executeCommand, lastNonEmptyLine, logger, type CommandResult } from '@reelkeeper/utils';

export type ProbeVerdict = 'ok' | 'corrupt' | 'timeout';

export interface CorruptionProbe {
  /** Throws SpawnFailedError when the decoder cannot be started */
  check(path: string, signal?: AbortSignal): Promise<ProbeVerdict>;
}

export class FFmpegCorruptionProbe implements CorruptionProbe {
  constructor(
    private readonly binary: string,
    private readonly timeoutMs: number
  ) {}

  async check(path: string, signal?: AbortSignal): Promise<ProbeVerdict> {
    let result: CommandResult;
    try {
      result = await executeCommand(this.binary, ['-v', 'error', '-i', path, '-f', 'null', '-'], {
        timeout: this.timeoutMs,
        killGraceMs: 500,
        signal,
      });
    } catch (error) {
      throw new SpawnFailedError(
        this.binary,
        isErrno(error, 'ENOENT') ? 'not-found' : isErrno(error, 'EACCES') ? 'permission-denied' : 'unknown',
        error instanceof Error ? error.message : undefined
      );
    }

    if (result.timedOut) {
      logger.warn({ err: new ProbeTimeoutError(path, this.timeoutMs) }, 'Corruption probe timed out');
      return 'timeout';
    }
    if (result.aborted) {
      return 'ok';
    }
    if (result.exitCode !== 0 || lastNonEmptyLine(result.stderr) !== '') {
      logger.debug({ path, exitCode: result.exitCode, detail: lastNonEmptyLine(result.stderr) }, 'Decode errors');
      return 'corrupt';
    }
    return 'ok';
  }
}

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
