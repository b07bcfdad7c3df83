/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import { OperationState } from '@reelkeeper/core';
import type { OperationResult } from '@reelkeeper/operations';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

/**
 * One closing line for a finished operation
 */
export function printResult(result: OperationResult<unknown>): void {
  const units = `${result.jobCount}/${result.jobTotal} unit(s)`;
  switch (result.state) {
    case OperationState.COMPLETED:
      printSuccess(`${result.operation} completed, ${units}`);
      return;
    case OperationState.CANCELLED:
      printWarning(`${result.operation} stopped after ${units}`);
      return;
    case OperationState.FATAL:
      printError(`${result.operation} halted: ${result.error ?? 'unknown error'}`);
      return;
  }
}
