export type {
  LifecycleEvent,
  LifecycleState,
  MigrationOutcome,
  MigrationPhase,
  ProgressCallback,
  ReleaseRecord,
  TeardownError,
  TeardownResult,
} from './deployment.js';
export {
  type HookPhase,
  type ManifestPayload,
  type ReadinessEvaluator,
  type ResourceManifest,
  type ResourcePlacement,
  type ResourceRef,
  type ResourceStatus,
  toResourceRef,
} from './kubernetes.js';
export {
  COMPONENTS,
  type Component,
  type DatabaseMode,
  type ReleaseIdentity,
} from './release.js';
