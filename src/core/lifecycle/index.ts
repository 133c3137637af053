export { DEFAULT_READINESS_CONFIG, type ReadinessConfig, ResourceReadinessWaiter } from './readiness.js';
export {
  DEFAULT_SCHEDULER_OPTIONS,
  type LifecycleResult,
  LifecycleScheduler,
  lastSuccessfulMigrationChecksum,
  type SchedulerOptions,
  WORKLOAD_KINDS,
} from './scheduler.js';
export { canTransition, isTerminalState, LifecycleStateMachine, phaseOfState } from './state-machine.js';
export { ReleaseTeardown, type TeardownConfig } from './teardown.js';
