/**
 * Lifecycle state machine of one deploy operation
 */

import { IllegalTransitionError, type OperationPhase } from '../errors.js';
import type { LifecycleState } from '../types/index.js';

const TRANSITIONS: Readonly<Record<LifecycleState, readonly LifecycleState[]>> = {
  // MigrationSucceeded directly: a matching migration already ran.
  // WorkloadRollout directly: no migration hook was rendered.
  Rendering: ['MigrationPending', 'MigrationSucceeded', 'WorkloadRollout'],
  MigrationPending: ['MigrationRunning'],
  MigrationRunning: ['MigrationSucceeded', 'MigrationFailed'],
  MigrationSucceeded: ['WorkloadRollout'],
  MigrationFailed: [],
  WorkloadRollout: ['Complete'],
  Complete: [],
};

const STATE_PHASES: Readonly<Record<LifecycleState, OperationPhase>> = {
  Rendering: 'render',
  MigrationPending: 'migrate',
  MigrationRunning: 'migrate',
  MigrationSucceeded: 'migrate',
  MigrationFailed: 'migrate',
  WorkloadRollout: 'rollout',
  Complete: 'rollout',
};

export function canTransition(from: LifecycleState, to: LifecycleState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: LifecycleState): boolean {
  return TRANSITIONS[state].length === 0;
}

export function phaseOfState(state: LifecycleState): OperationPhase {
  return STATE_PHASES[state];
}

export class LifecycleStateMachine {
  private current: LifecycleState = 'Rendering';
  private readonly visited: LifecycleState[] = ['Rendering'];

  get state(): LifecycleState {
    return this.current;
  }

  /** Every state entered so far, in order */
  get history(): readonly LifecycleState[] {
    return this.visited;
  }

  transition(to: LifecycleState): LifecycleState {
    if (!canTransition(this.current, to)) {
      throw new IllegalTransitionError(this.current, to, phaseOfState(this.current));
    }
    const from = this.current;
    this.current = to;
    this.visited.push(to);
    return from;
  }
}
