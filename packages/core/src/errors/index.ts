/**
 * Custom Error Classes
 *
 * Every failure a manager reports to the progress sink is one of these.
 * `fatal` errors halt the whole operation; the rest are tallied per unit.
 */

import type { OperationState } from '../stateMachine.js';

/**
 * Base error class for all reelkeeper errors
 */
export class ReelkeeperError extends Error {
  public readonly code: string;
  public readonly fatal: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    fatal: boolean = false,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ReelkeeperError';
    this.code = code;
    this.fatal = fatal;
    this.details = details;
    
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends ReelkeeperError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      false,
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * State transition error for invalid operation state changes
 */
export class StateTransitionError extends ReelkeeperError {
  constructor(
    operation: string,
    fromState: OperationState,
    toState: OperationState
  ) {
    super(
      `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      false,
      { operation, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

export type SpawnFailureReason =
  | 'not-found'
  | 'permission-denied'
  | 'malformed-argv'
  | 'unknown';

const spawnReasonText: Record<SpawnFailureReason, string> = {
  'not-found': 'executable not found',
  'permission-denied': 'permission denied',
  'malformed-argv': 'malformed argument list',
  'unknown': 'could not start process',
};

/**
 * Not found error for missing registry entries
 */
export class NotFoundError extends ReelkeeperError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      false,
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * An external program could not be started
 */
export class SpawnFailedError extends ReelkeeperError {
  public readonly reason: SpawnFailureReason;

  constructor(command: string, reason: SpawnFailureReason, cause?: string) {
    super(
      `Failed to start ${command}: ${spawnReasonText[reason]}`,
      'SPAWN_FAILED',
      false,
      { command, reason, cause }
    );
    this.name = 'SpawnFailedError';
    this.reason = reason;
  }
}

/**
 * An external program ran but exited with a non-zero code.
 * The message is the last non-empty stderr line when there is one.
 */
export class NonZeroExitError extends ReelkeeperError {
  public readonly exitCode: number;

  constructor(command: string, exitCode: number, lastLine: string = '') {
    super(
      lastLine || `Child process exited with non-zero code: ${exitCode}`,
      'NON_ZERO_EXIT',
      false,
      { command, exitCode }
    );
    this.name = 'NonZeroExitError';
    this.exitCode = exitCode;
  }
}

/**
 * The file an operation needs is unknown or absent
 */
export class FileMissingError extends ReelkeeperError {
  constructor(entityName: string, path: string | null) {
    super(
      path === null
        ? `No file known for '${entityName}'`
        : `File not found for '${entityName}': ${path}`,
      'FILE_MISSING',
      false,
      { entityName, path }
    );
    this.name = 'FileMissingError';
  }
}

/**
 * A name collision prevents creating a container. Always fatal.
 */
export class DestinationConflictError extends ReelkeeperError {
  constructor(name: string) {
    super(
      `A channel, playlist or folder called '${name}' already exists`,
      'DESTINATION_CONFLICT',
      true,
      { name }
    );
    this.name = 'DestinationConflictError';
  }
}

/**
 * The corruption probe did not finish in time
 */
export class ProbeTimeoutError extends ReelkeeperError {
  constructor(path: string, timeoutMs: number) {
    super(
      `Probe timed out after ${timeoutMs}ms: ${path}`,
      'PROBE_TIMEOUT',
      false,
      { path, timeoutMs }
    );
    this.name = 'ProbeTimeoutError';
  }
}

/**
 * A pipe message arrived without a recognisable stream tag
 */
export class MalformedStreamDataError extends ReelkeeperError {
  constructor(detail: string) {
    super(
      `Malformed stream data: ${detail}`,
      'MALFORMED_STREAM_DATA',
      false,
      { detail }
    );
    this.name = 'MalformedStreamDataError';
  }
}

/**
 * One-line description of anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
