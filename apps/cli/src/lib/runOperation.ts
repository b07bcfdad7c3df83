/**
 * Runs one manager in the foreground: console sink, Ctrl+C to stop, snapshot
 * saved afterwards, exit code from the terminal state.
 */

import { NotFoundError, OperationState, type Container, type MediaRegistry } from '@reelkeeper/core';
import type { OperationContext, OperationManager, OperationResult } from '@reelkeeper/operations';
import { createLogger } from '@reelkeeper/utils';
import { saveSession, type Session } from '../config/index.js';
import { ConsoleSink } from './consoleSink.js';
import { printJson, printResult, printWarning } from './output.js';

const logger = createLogger({ module: 'cli' });

export interface GlobalOptions {
  json?: boolean;
  commands?: boolean;
}

/** Exit code for a run interrupted with SIGINT */
const INTERRUPTED_EXIT_CODE = 130;

export async function runOperation<TItem, TTally>(
  session: Session,
  build: (context: OperationContext) => OperationManager<TItem, TTally>,
  globals: GlobalOptions
): Promise<OperationResult<TTally>> {
  const sink = new ConsoleSink(globals.commands !== false && !globals.json);
  const manager = build({ registry: session.registry, config: session.config, sink });

  const onSigint = (): void => {
    printWarning('Stopping...');
    manager.stop();
  };
  process.once('SIGINT', onSigint);

  let result: OperationResult<TTally>;
  try {
    result = await manager.start();
  } finally {
    process.off('SIGINT', onSigint);
    sink.close();
  }

  await saveSession(session);
  logger.debug({ file: session.config.registryFile }, 'Registry saved');

  if (globals.json) {
    printJson({
      operation: result.operation,
      state: result.state,
      jobCount: result.jobCount,
      jobTotal: result.jobTotal,
      tally: result.tally,
      error: result.error,
    });
  } else {
    printResult(result);
  }

  process.exitCode = exitCodeFor(result.state);
  return result;
}

function exitCodeFor(state: OperationResult<unknown>['state']): number {
  switch (state) {
    case OperationState.COMPLETED:
      return 0;
    case OperationState.CANCELLED:
      return INTERRUPTED_EXIT_CODE;
    case OperationState.FATAL:
      return 1;
  }
}

/**
 * Look a container up by name or database id
 */
export function resolveContainer(registry: MediaRegistry, nameOrDbid: string): Container {
  const byName = registry.findContainerByName(nameOrDbid);
  if (byName) return byName;

  const dbid = Number(nameOrDbid);
  if (!Number.isInteger(dbid)) {
    throw new NotFoundError('Container', nameOrDbid);
  }
  return registry.getContainer(dbid);
}
