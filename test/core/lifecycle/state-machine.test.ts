import { describe, expect, it } from 'vitest';
import { IllegalTransitionError } from '../../../src/core/errors.js';
import {
  canTransition,
  isTerminalState,
  LifecycleStateMachine,
  phaseOfState,
} from '../../../src/core/lifecycle/index.js';

describe('LifecycleStateMachine', () => {
  it('should start in Rendering', () => {
    const machine = new LifecycleStateMachine();
    expect(machine.state).toBe('Rendering');
    expect(machine.history).toEqual(['Rendering']);
  });

  it('should follow the migration path to Complete', () => {
    const machine = new LifecycleStateMachine();
    for (const state of ['MigrationPending', 'MigrationRunning', 'MigrationSucceeded', 'WorkloadRollout', 'Complete'] as const) {
      machine.transition(state);
    }
    expect(machine.state).toBe('Complete');
    expect(machine.history).toEqual([
      'Rendering',
      'MigrationPending',
      'MigrationRunning',
      'MigrationSucceeded',
      'WorkloadRollout',
      'Complete',
    ]);
  });

  it('should return the state it left', () => {
    const machine = new LifecycleStateMachine();
    expect(machine.transition('WorkloadRollout')).toBe('Rendering');
  });

  it('should never allow workload rollout straight from a running migration', () => {
    const machine = new LifecycleStateMachine();
    machine.transition('MigrationPending');
    machine.transition('MigrationRunning');

    expect(() => machine.transition('WorkloadRollout')).toThrow(IllegalTransitionError);
    expect(() => machine.transition('WorkloadRollout')).toThrow(
      'Illegal lifecycle transition MigrationRunning -> WorkloadRollout'
    );
    expect(machine.state).toBe('MigrationRunning');
  });

  it('should report the phase of the state an illegal transition left from', () => {
    const machine = new LifecycleStateMachine();
    machine.transition('MigrationPending');
    try {
      machine.transition('Complete');
      expect.unreachable('transition is illegal');
    } catch (error) {
      expect(error instanceof IllegalTransitionError && error.phase).toBe('migrate');
    }
  });

  it('should treat MigrationFailed and Complete as terminal', () => {
    expect(isTerminalState('MigrationFailed')).toBe(true);
    expect(isTerminalState('Complete')).toBe(true);
    expect(isTerminalState('MigrationRunning')).toBe(false);
    expect(canTransition('MigrationFailed', 'WorkloadRollout')).toBe(false);
  });

  it('should map states to operation phases', () => {
    expect(phaseOfState('Rendering')).toBe('render');
    expect(phaseOfState('MigrationSucceeded')).toBe('migrate');
    expect(phaseOfState('WorkloadRollout')).toBe('rollout');
  });
});
