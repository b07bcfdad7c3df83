/**
 * Command Execution Wrapper
 * 
 * One-shot execution of an external command with:
 * - Timeout handling (the child is killed, the result is flagged)
 * - Output capture with a size cap
 * - AbortSignal support
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
  aborted: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  killGraceMs?: number;
  signal?: AbortSignal;
}

/**
 * Execute an external command and collect its output.
 *
 * Rejects only when the command cannot be spawned; a non-zero exit, a timeout
 * or an abort all resolve with the corresponding flags set.
 */
export async function executeCommand(
  command: string,
  args: readonly string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000,
    maxOutputSize = 10 * 1024 * 1024,
    killGraceMs = 2000,
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;
  let aborted = false;

  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let forceKillId: NodeJS.Timeout | null = null;

    const terminate = (): void => {
      child.kill('SIGTERM');
      forceKillId = setTimeout(() => child.kill('SIGKILL'), killGraceMs);
    };

    const timeoutId = setTimeout(() => {
      timedOut = true;
      terminate();
    }, timeout);

    const onAbort = (): void => {
      aborted = true;
      terminate();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const cleanup = (): void => {
      clearTimeout(timeoutId);
      if (forceKillId) clearTimeout(forceKillId);
      signal?.removeEventListener('abort', onAbort);
    };

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, killSignal) => {
      cleanup();
      resolve({
        exitCode: code ?? (killSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
        aborted,
      });
    });

    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
}

/**
 * Last non-empty line of a block of command output, or '' if there is none
 */
export function lastNonEmptyLine(output: string): string {
  const lines = output.split(/\r?\n/);
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i]?.trim();
    if (line) return line;
  }
  return '';
}
