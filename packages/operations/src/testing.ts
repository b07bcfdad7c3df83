/**
 * In-process stand-ins for the progress sink and the child process launcher,
 * shared by the manager tests
 */

import {
  MediaRegistry,
  SpawnFailedError,
  loadConfig,
  type AppConfig,
  type ProgressSink,
  type SpawnFailureReason,
} from '@reelkeeper/core';
import type {
  PipeMessageQueue,
  ProcessHandle,
  ProcessLauncher,
  RunnerSpawnOptions,
} from '@reelkeeper/processing';

export type SinkCall =
  | { method: 'writeInfo' | 'writeError' | 'writeCommand'; channel: number; text: string }
  | { method: 'updateProgress'; label: string; done: number; total: number };

export class RecordingSink implements ProgressSink {
  readonly calls: SinkCall[] = [];

  writeInfo(channel: number, text: string): void {
    this.calls.push({ method: 'writeInfo', channel, text });
  }

  writeError(channel: number, text: string): void {
    this.calls.push({ method: 'writeError', channel, text });
  }

  writeCommand(channel: number, text: string): void {
    this.calls.push({ method: 'writeCommand', channel, text });
  }

  updateProgress(label: string, done: number, total: number): void {
    this.calls.push({ method: 'updateProgress', label, done, total });
  }

  /** Text of every writeInfo call, in order */
  get info(): string[] {
    return this.texts('writeInfo');
  }

  get errors(): string[] {
    return this.texts('writeError');
  }

  get commands(): string[] {
    return this.texts('writeCommand');
  }

  private texts(method: 'writeInfo' | 'writeError' | 'writeCommand'): string[] {
    const result: string[] = [];
    for (const call of this.calls) {
      if (call.method === method) result.push(call.text);
    }
    return result;
  }
}

/**
 * What one scripted child does
 */
export interface FakeRun {
  stdout?: string[];
  stderr?: string[];
  exitCode?: number;
  /** Keep running (and keep the pipes open) until killed */
  hang?: boolean;
  spawnError?: SpawnFailureReason;
  /** Runs before any output, e.g. to write the files a real child would */
  effect?: (argv: readonly string[]) => Promise<void>;
}

const KILLED_EXIT_CODE = 137;

class FakeHandle implements ProcessHandle {
  readonly pid = undefined;
  private alive = true;
  private readonly exited: Promise<number>;
  private resolveExit: (code: number) => void = () => undefined;

  constructor(readonly command: string, private readonly onKill: () => void) {
    this.exited = new Promise<number>(resolve => {
      this.resolveExit = resolve;
    });
  }

  isAlive(): boolean {
    return this.alive;
  }

  wait(): Promise<number> {
    return this.exited;
  }

  exit(code: number): void {
    if (!this.alive) return;
    this.alive = false;
    this.resolveExit(code);
  }

  kill(): void {
    if (!this.alive) return;
    this.onKill();
    this.exit(KILLED_EXIT_CODE);
  }
}

export class FakeLauncher implements ProcessLauncher {
  readonly calls: string[][] = [];
  killCount = 0;

  constructor(private readonly script: (argv: readonly string[]) => FakeRun = () => ({})) {}

  async spawn(
    argv: readonly string[],
    queue: PipeMessageQueue,
    options: RunnerSpawnOptions = {}
  ): Promise<ProcessHandle> {
    this.calls.push([...argv]);
    const run = this.script(argv);

    if (run.spawnError !== undefined) {
      throw new SpawnFailedError(argv[0] ?? '(none)', run.spawnError);
    }
    if (run.effect) {
      await run.effect(argv);
    }

    queue.openWriter();
    let writerOpen = true;
    const closeWriter = (): void => {
      if (writerOpen) {
        writerOpen = false;
        queue.closeWriter();
      }
    };

    const handle = new FakeHandle(argv.join(' '), () => {
      this.killCount++;
      closeWriter();
    });

    let ignoring = false;
    for (const line of run.stdout ?? []) {
      if (!ignoring && options.ignoreFrom?.test(line)) ignoring = true;
      if (!ignoring) queue.push('stdout', line);
    }
    for (const line of run.stderr ?? []) {
      queue.push('stderr', line);
    }

    if (!run.hang) {
      closeWriter();
      handle.exit(run.exitCode ?? 0);
    }
    return handle;
  }
}

export interface TestContext {
  registry: MediaRegistry;
  config: AppConfig;
  sink: RecordingSink;
  launcher: FakeLauncher;
}

/**
 * Quiet configuration rooted at `dataDir`, with no pause between units
 */
export function testConfig(dataDir: string): AppConfig {
  return loadConfig(
    {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      REELKEEPER_DATA_DIR: dataDir,
      RECONCILE_INTERVAL_MS: '0',
      SUBPROCESS_INTERVAL_MS: '10',
    },
    dataDir
  );
}

export function testContext(dataDir: string, launcher: FakeLauncher = new FakeLauncher()): TestContext {
  const config = testConfig(dataDir);
  const registry = new MediaRegistry({
    dataDir: config.dataDir,
    thumbsSubDir: config.layout.thumbsSubDir,
    metadataSubDir: config.layout.metadataSubDir,
  });
  return { registry, config, sink: new RecordingSink(), launcher };
}
