/**
 * Operation Manager
 *
 * Shared run loop for the download, process, refresh, tidy and update
 * managers. One async task per run works through a worklist one unit at a
 * time, with a short abortable pause between units.
 *
 * Events:
 * - 'progress' (OperationProgress) after every unit
 * - 'finished' (OperationResult) once, when the run reaches a terminal state
 *
 * After the termination message nothing more reaches the progress sink.
 */

import { EventEmitter } from 'node:events';
import {
  MalformedStreamDataError,
  OperationState,
  OperationStateMachine,
  ReelkeeperError,
  describeError,
  nullSink,
  type AppConfig,
  type MediaRegistry,
  type ProgressSink,
} from '@reelkeeper/core';
import {
  ChildProcessRunner,
  PipeMessageQueue,
  formatCommand,
  type PipeMessage,
  type ProcessHandle,
  type ProcessLauncher,
  type RunnerSpawnOptions,
} from '@reelkeeper/processing';
import { createLogger, formatDuration, sleep, type Logger } from '@reelkeeper/utils';

export type OperationKind = 'download' | 'process' | 'refresh' | 'tidy' | 'update';

/** Sink channel per operation kind */
const SINK_CHANNELS: Record<OperationKind, number> = {
  download: 0,
  process: 1,
  refresh: 2,
  tidy: 3,
  update: 4,
};

export type TerminalState =
  | typeof OperationState.COMPLETED
  | typeof OperationState.CANCELLED
  | typeof OperationState.FATAL;

export interface OperationContext {
  registry: MediaRegistry;
  config: AppConfig;
  sink?: ProgressSink;
  launcher?: ProcessLauncher;
}

export interface OperationProgress {
  operation: OperationKind;
  label: string;
  jobCount: number;
  jobTotal: number;
}

export interface OperationResult<TTally> {
  operation: OperationKind;
  state: TerminalState;
  startTime: Date;
  stopTime: Date;
  jobCount: number;
  jobTotal: number;
  tally: TTally;
  /** Set when the run ended FATAL */
  error: string | null;
}

export interface ChildOutcome {
  exitCode: number;
  /** The run was stopped while the child was active */
  killed: boolean;
  /** Last non-empty stderr line */
  lastError: string;
}

export interface ChildLineHandlers {
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

export abstract class OperationManager<TItem, TTally> extends EventEmitter {
  protected readonly logger: Logger;
  protected readonly registry: MediaRegistry;
  protected readonly config: AppConfig;
  protected readonly launcher: ProcessLauncher;
  protected readonly worklist: TItem[];
  protected readonly tally: TTally;

  protected jobCount = 0;
  protected jobTotal: number;
  protected runningFlag = false;

  private readonly sink: ProgressSink;
  private readonly stateMachine: OperationStateMachine;
  private readonly abortController = new AbortController();
  private sinkOpen = true;
  private activeChild: ProcessHandle | null = null;

  constructor(
    readonly operation: OperationKind,
    context: OperationContext,
    worklist: readonly TItem[],
    tally: TTally,
    private readonly intervalMs: number
  ) {
    super();
    this.registry = context.registry;
    this.config = context.config;
    this.sink = context.sink ?? nullSink;
    this.launcher = context.launcher ?? new ChildProcessRunner();
    this.worklist = [...worklist];
    this.jobTotal = this.worklist.length;
    this.tally = tally;
    this.stateMachine = new OperationStateMachine(operation);
    this.logger = createLogger({ module: `${operation}-manager` });
  }

  getState(): OperationState {
    return this.stateMachine.getState();
  }

  isRunning(): boolean {
    return this.runningFlag;
  }

  /**
   * Run the whole worklist. Resolves (never rejects) with the final tally.
   */
  async start(): Promise<OperationResult<TTally>> {
    this.stateMachine.transitionTo(OperationState.RUNNING);
    this.runningFlag = true;
    const startTime = new Date();
    this.logger.info({ jobTotal: this.jobTotal }, 'Operation started');

    let fatal: unknown = null;
    try {
      await this.prepare();

      while (this.runningFlag) {
        const item = this.worklist.shift();
        if (item === undefined) break;

        try {
          await this.processItem(item);
        } catch (error) {
          if (isFatal(error)) {
            fatal = error;
            break;
          }
          this.logger.warn({ err: error }, 'Unit failed');
          this.writeError(describeError(error));
        }

        this.jobCount++;
        this.reportProgress(this.describeItem(item));

        if (this.runningFlag && this.worklist.length > 0) {
          await sleep(this.intervalMs, this.abortController.signal);
        }
      }
    } catch (error) {
      fatal = error;
    }

    return this.finish(startTime, fatal);
  }

  /**
   * Ask the run to stop. Observed within one interval; an active child is
   * killed straight away.
   */
  stop(): void {
    if (!this.runningFlag) return;
    this.logger.info('Stop requested');
    this.runningFlag = false;
    this.abortController.abort();
    this.activeChild?.kill();
  }

  /**
   * Called once before the loop; may extend the worklist
   */
  protected async prepare(): Promise<void> {
    // Nothing by default
  }

  protected abstract processItem(item: TItem): Promise<void>;

  protected abstract describeItem(item: TItem): string;

  /**
   * Lines summarising the tally, written before the termination message
   */
  protected abstract summarise(): string[];

  protected get signal(): AbortSignal {
    return this.abortController.signal;
  }

  protected addWork(items: readonly TItem[]): void {
    this.worklist.push(...items);
    this.jobTotal += items.length;
  }

  // ==========================================================================
  // Progress sink
  // ==========================================================================

  protected writeInfo(text: string): void {
    if (this.sinkOpen) this.sink.writeInfo(SINK_CHANNELS[this.operation], text);
  }

  protected writeError(text: string): void {
    if (this.sinkOpen) this.sink.writeError(SINK_CHANNELS[this.operation], text);
  }

  protected writeCommand(text: string): void {
    if (this.sinkOpen) this.sink.writeCommand(SINK_CHANNELS[this.operation], text);
  }

  private reportProgress(label: string): void {
    if (this.sinkOpen) this.sink.updateProgress(label, this.jobCount, this.jobTotal);
    const progress: OperationProgress = {
      operation: this.operation,
      label,
      jobCount: this.jobCount,
      jobTotal: this.jobTotal,
    };
    this.emit('progress', progress);
  }

  // ==========================================================================
  // Child processes
  // ==========================================================================

  /**
   * Run one child to completion, replaying its output in arrival order.
   * Throws SpawnFailedError when it cannot be started.
   */
  protected async runChild(
    argv: readonly string[],
    handlers: ChildLineHandlers,
    options: RunnerSpawnOptions = {}
  ): Promise<ChildOutcome> {
    const queue = new PipeMessageQueue();
    this.writeCommand(formatCommand(argv));
    this.logger.debug({ argv }, 'Spawning child');

    const handle = await this.launcher.spawn(argv, queue, options);
    this.activeChild = handle;
    let lastError = '';

    try {
      if (!this.runningFlag) handle.kill();

      while (!queue.isDrained()) {
        if (this.signal.aborted) {
          handle.kill();
          break;
        }
        const message = await queue.pop(this.config.intervals.subprocessMs, this.signal);
        if (message === null) continue;

        const line = this.dispatch(message, handlers);
        if (line !== null) lastError = line;
      }

      const exitCode = await handle.wait();
      queue.drain();
      return { exitCode, killed: this.signal.aborted, lastError };
    } finally {
      this.activeChild = null;
    }
  }

  /**
   * Returns the line when it was a non-empty stderr line
   */
  private dispatch(message: PipeMessage, handlers: ChildLineHandlers): string | null {
    switch (message.stream) {
      case 'stdout':
        handlers.stdout?.(message.data);
        return null;
      case 'stderr':
        handlers.stderr?.(message.data);
        return message.data.trim() === '' ? null : message.data.trim();
      default: {
        const tag: never = message.stream;
        this.logger.warn(
          { err: new MalformedStreamDataError(`message ${message.seq} has stream tag ${String(tag)}`) },
          'Skipping pipe message'
        );
        return null;
      }
    }
  }

  // ==========================================================================
  // Termination
  // ==========================================================================

  private finish(startTime: Date, fatal: unknown): OperationResult<TTally> {
    const wasStopped = this.signal.aborted;
    this.runningFlag = false;

    let state: TerminalState;
    if (fatal !== null) {
      state = OperationState.FATAL;
    } else if (wasStopped) {
      state = OperationState.CANCELLED;
    } else {
      state = OperationState.COMPLETED;
    }
    this.stateMachine.transitionTo(state);

    const stopTime = new Date();
    const elapsed = formatDuration(stopTime.getTime() - startTime.getTime());

    if (fatal !== null) {
      this.writeError(describeError(fatal));
    }
    for (const line of this.summarise()) {
      this.writeInfo(line);
    }
    this.writeInfo(terminationMessage(this.operation, state, elapsed));
    this.sinkOpen = false;

    const result: OperationResult<TTally> = {
      operation: this.operation,
      state,
      startTime,
      stopTime,
      jobCount: this.jobCount,
      jobTotal: this.jobTotal,
      tally: this.tally,
      error: fatal === null ? null : describeError(fatal),
    };

    if (fatal !== null) {
      this.logger.error({ err: fatal, tally: this.tally }, 'Operation halted');
    } else {
      this.logger.info({ state, tally: this.tally, elapsed }, 'Operation finished');
    }

    this.emit('finished', result);
    return result;
  }
}

function isFatal(error: unknown): boolean {
  return error instanceof ReelkeeperError && error.fatal;
}

function terminationMessage(operation: OperationKind, state: TerminalState, elapsed: string): string {
  const name = operation.charAt(0).toUpperCase() + operation.slice(1);
  switch (state) {
    case OperationState.COMPLETED:
      return `${name} operation finished (${elapsed})`;
    case OperationState.CANCELLED:
      return `${name} operation stopped (${elapsed})`;
    case OperationState.FATAL:
      return `${name} operation halted (${elapsed})`;
  }
}
