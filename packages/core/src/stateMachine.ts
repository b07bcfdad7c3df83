/**
 * Operation State Machine
 * 
 * Lifecycle of one operation run.
 * 
 * State Flow:
 * IDLE → RUNNING → COMPLETED
 *              ↘ CANCELLED
 *              ↘ FATAL
 * 
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - COMPLETED, CANCELLED and FATAL are terminal; a new run needs a new machine
 */

import { StateTransitionError } from './errors/index.js';

export const OperationState = {
  IDLE: 'IDLE',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  CANCELLED: 'CANCELLED',
  FATAL: 'FATAL',
} as const;

export type OperationState = typeof OperationState[keyof typeof OperationState];

/**
 * Represents a state transition with metadata
 */
export interface OperationStateTransition {
  from: OperationState;
  to: OperationState;
  timestamp: Date;
  reason?: string;
}

/**
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<OperationState, Set<OperationState>> = {
  IDLE: new Set<OperationState>(['RUNNING']),
  RUNNING: new Set<OperationState>(['COMPLETED', 'CANCELLED', 'FATAL']),
  COMPLETED: new Set<OperationState>(),
  CANCELLED: new Set<OperationState>(),
  FATAL: new Set<OperationState>(),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: OperationState, to: OperationState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: OperationState): OperationState[] {
  return Array.from(validTransitions[current]);
}

export class OperationStateMachine {
  private currentState: OperationState = OperationState.IDLE;
  private history: OperationStateTransition[] = [];

  constructor(private readonly operation: string) {}

  getState(): OperationState {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<OperationStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: OperationState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: OperationState, reason?: string): OperationStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.operation, this.currentState, targetState);
    }

    const transition: OperationStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isRunning(): boolean {
    return this.currentState === OperationState.RUNNING;
  }

  isTerminal(): boolean {
    return validTransitions[this.currentState].size === 0;
  }
}
