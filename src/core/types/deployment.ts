/**
 * Deployment-related types
 */

import type { MigrationFailureReason } from '../errors.js';
import type { ResourceRef } from './kubernetes.js';

export type LifecycleState =
  | 'Rendering'
  | 'MigrationPending'
  | 'MigrationRunning'
  | 'MigrationSucceeded'
  | 'MigrationFailed'
  | 'WorkloadRollout'
  | 'Complete';

export interface LifecycleEvent {
  type:
    | 'state-changed'
    | 'resource-applied'
    | 'resource-deleted'
    | 'resource-ready'
    | 'migration-skipped'
    | 'migration-created'
    | 'migration-observed'
    | 'migration-deleted'
    | 'migration-retained'
    | 'completed'
    | 'failed';
  revision: number;
  message: string;
  state?: LifecycleState;
  resourceId?: string;
  timestamp: Date;
  error?: Error;
  details?: Record<string, unknown>;
}

export type ProgressCallback = (event: LifecycleEvent) => void;

export type MigrationPhase = 'pending' | 'running' | 'succeeded' | 'failed';

/**
 * What happened to the migration task during one deploy operation
 */
export interface MigrationOutcome {
  status: 'skipped' | 'disabled' | 'succeeded' | 'failed';
  checksum?: string;
  taskName?: string;
  reason?: MigrationFailureReason;
  message?: string;
}

export interface TeardownError {
  resourceId: string;
  error: Error;
  timestamp: Date;
}

export interface TeardownResult {
  releaseName: string;
  deletedResources: string[];
  duration: number;
  status: 'success' | 'partial' | 'failed';
  errors: TeardownError[];
}

/**
 * Driver-persisted summary of one revision of a release
 */
export interface ReleaseRecord {
  releaseName: string;
  namespace: string;
  revision: number;
  status: 'deployed' | 'failed' | 'superseded';
  /** Applied resources in apply order */
  resources: ResourceRef[];
  migration: MigrationOutcome;
  settingsChecksum: string;
  updatedAt: string;
  description?: string;
}
