/**
 * Child Process Runner
 *
 * Starts an external program with both output streams wired into a shared
 * PipeMessageQueue. On POSIX the child leads a new process group, so kill()
 * takes down any helpers it started too. Windows has no process groups here:
 * only the child itself is killed.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { SpawnFailedError, type SpawnFailureReason } from '@reelkeeper/core';
import { logger } from '@reelkeeper/utils';
import { PipeReader, type PipeMessageQueue, type PipeReaderOptions } from './pipeReader.js';

export interface RunnerSpawnOptions extends PipeReaderOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ProcessHandle {
  readonly pid: number | undefined;
  /** The command as it would be typed at a shell, for display */
  readonly command: string;
  isAlive(): boolean;
  /** Resolves with the exit code once the process and its pipes have closed */
  wait(): Promise<number>;
  /** Idempotent */
  kill(): void;
}

export interface ProcessLauncher {
  spawn(
    argv: readonly string[],
    queue: PipeMessageQueue,
    options?: RunnerSpawnOptions
  ): Promise<ProcessHandle>;
}

const CHAIN_OPERATOR = '&&';
const isWindows = process.platform === 'win32';

/**
 * Quote one argument for the platform shell
 */
export function quoteShellArg(arg: string): string {
  if (isWindows) {
    return /[\s"&|<>^]/.test(arg) ? `"${arg.replace(/"/g, '""')}"` : arg;
  }
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Join an argument vector into one display/shell string; `&&` stays bare
 */
export function formatCommand(argv: readonly string[]): string {
  return argv.map(arg => (arg === CHAIN_OPERATOR ? arg : quoteShellArg(arg))).join(' ');
}

function validateArgv(argv: readonly unknown[]): string | null {
  if (argv.length === 0) return 'empty argument list';
  for (const [index, arg] of argv.entries()) {
    if (typeof arg !== 'string') return `argument ${index} is not a string`;
    if (arg.includes('\0')) return `argument ${index} contains a NUL byte`;
  }
  if (argv[0] === CHAIN_OPERATOR || argv[argv.length - 1] === CHAIN_OPERATOR) {
    return 'dangling && operator';
  }
  return null;
}

function spawnFailureReason(error: NodeJS.ErrnoException): SpawnFailureReason {
  switch (error.code) {
    case 'ENOENT':
      return 'not-found';
    case 'EACCES':
    case 'EPERM':
      return 'permission-denied';
    case 'ERR_INVALID_ARG_TYPE':
    case 'ERR_INVALID_ARG_VALUE':
      return 'malformed-argv';
    default:
      return 'unknown';
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

class ChildProcessHandle implements ProcessHandle {
  private exitCode: number | null = null;
  private killed = false;
  private readonly exited: Promise<number>;

  constructor(
    private readonly child: ChildProcess,
    readonly command: string,
    private readonly groupLeader: boolean
  ) {
    this.exited = new Promise<number>(resolve => {
      child.once('close', (code, signal) => {
        this.exitCode = code ?? (signal ? 128 : 1);
        resolve(this.exitCode);
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isAlive(): boolean {
    return this.exitCode === null;
  }

  wait(): Promise<number> {
    return this.exited;
  }

  kill(): void {
    if (this.killed || !this.isAlive()) return;
    this.killed = true;

    const pid = this.child.pid;
    if (this.groupLeader && pid !== undefined) {
      try {
        process.kill(-pid, 'SIGKILL');
        return;
      } catch (error) {
        // Group already gone; fall through to the child itself
        logger.debug({ pid, err: error }, 'Process group kill failed');
      }
    }
    this.child.kill('SIGKILL');
  }
}

export class ChildProcessRunner implements ProcessLauncher {
  async spawn(
    argv: readonly string[],
    queue: PipeMessageQueue,
    options: RunnerSpawnOptions = {}
  ): Promise<ProcessHandle> {
    const problem = validateArgv(argv);
    const displayName = typeof argv[0] === 'string' ? argv[0] : '(none)';
    if (problem) {
      throw new SpawnFailedError(displayName, 'malformed-argv', problem);
    }

    const command = formatCommand(argv);
    const chained = argv.includes(CHAIN_OPERATOR);
    const [file, ...args] = chained
      ? (isWindows ? ['cmd.exe', '/d', '/s', '/c', `"${command}"`] : ['/bin/sh', '-c', command])
      : argv;
    if (file === undefined) {
      throw new SpawnFailedError(displayName, 'malformed-argv', 'empty argument list');
    }

    let child: ChildProcess;
    try {
      child = spawn(file, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: !isWindows,
        windowsHide: true,
        windowsVerbatimArguments: chained && isWindows,
      });
    } catch (error) {
      const reason = isErrnoException(error) ? spawnFailureReason(error) : 'unknown';
      throw new SpawnFailedError(displayName, reason, isErrnoException(error) ? error.message : undefined);
    }

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: NodeJS.ErrnoException): void => {
        child.off('spawn', onSpawn);
        reject(new SpawnFailedError(displayName, spawnFailureReason(error), error.message));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    // Late errors (e.g. a failed kill) must not crash the process
    child.on('error', error => logger.warn({ err: error, command }, 'Child process error'));

    new PipeReader(child.stdout, 'stdout', queue, options);
    new PipeReader(child.stderr, 'stderr', queue, options);

    logger.debug({ command, pid: child.pid }, 'Child process started');
    return new ChildProcessHandle(child, command, !isWindows);
  }
}
