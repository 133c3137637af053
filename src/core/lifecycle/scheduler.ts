/**
 * Lifecycle Scheduler
 *
 * Sequences one deploy operation against the release driver: foundation
 * resources first, then the migration hook, then the application workloads.
 * Workloads are never submitted before the migration of the current
 * revision has been observed to succeed.
 */

import type { ReleaseDriver } from '../driver/index.js';
import { MigrationFailedError, type MigrationFailureReason } from '../errors.js';
import { getReleaseLogger } from '../logging/index.js';
import { ANNOTATIONS } from '../naming/index.js';
import type { RenderedRelease } from '../rendering/index.js';
import {
  type LifecycleEvent,
  type LifecycleState,
  type MigrationOutcome,
  type MigrationPhase,
  type ProgressCallback,
  type ReleaseRecord,
  type ResourceManifest,
  type ResourceRef,
  toResourceRef,
} from '../types/index.js';
import { jobPhase } from '../../factories/kubernetes/workloads/job.js';
import { delay, stringAt } from '../../utils/index.js';
import { ResourceReadinessWaiter } from './readiness.js';
import { LifecycleStateMachine } from './state-machine.js';

/** Kinds held back until the migration has succeeded, in apply order */
export const WORKLOAD_KINDS = ['Deployment', 'HorizontalPodAutoscaler'] as const;

export interface SchedulerOptions {
  pollIntervalMs: number;
  migrationTimeoutMs: number;
  rolloutTimeoutMs: number;
  successGraceMs: number;
  waitForReady: boolean;
  retainOnSuccess: boolean;
  retainOnFailure: boolean;
  progressCallback?: ProgressCallback | undefined;
}

export const DEFAULT_SCHEDULER_OPTIONS: SchedulerOptions = {
  pollIntervalMs: 2000,
  migrationTimeoutMs: 300000,
  rolloutTimeoutMs: 300000,
  successGraceMs: 10000,
  waitForReady: true,
  retainOnSuccess: false,
  retainOnFailure: true,
};

export interface LifecycleResult {
  state: Extract<LifecycleState, 'Complete' | 'MigrationFailed'>;
  /** Resources left in the cluster by this run, in apply order */
  applied: ResourceRef[];
  migration: MigrationOutcome;
  /** Every state entered, in order */
  states: readonly LifecycleState[];
  duration: number;
}

function isWorkload(manifest: ResourceManifest): boolean {
  return WORKLOAD_KINDS.some((kind) => kind === manifest.kind);
}

function workloadOrder(manifest: ResourceManifest): number {
  return WORKLOAD_KINDS.findIndex((kind) => kind === manifest.kind);
}

/**
 * Checksum of the most recent migration that ran to success. A later failed
 * attempt hides any earlier success.
 */
export function lastSuccessfulMigrationChecksum(records: readonly ReleaseRecord[]): string | undefined {
  const attempts = [...records]
    .sort((a, b) => b.revision - a.revision)
    .filter((record) => record.migration.status !== 'disabled');
  const latest = attempts[0];
  if (!latest || latest.migration.status === 'failed') {
    return undefined;
  }
  return latest.migration.checksum;
}

type ObservedMigration =
  | { kind: 'absent' }
  | { kind: 'reuse'; phase: MigrationPhase }
  | { kind: 'stale'; reason: string };

export class LifecycleScheduler {
  private readonly options: SchedulerOptions;

  constructor(
    private readonly driver: ReleaseDriver,
    options: Partial<SchedulerOptions> = {}
  ) {
    this.options = { ...DEFAULT_SCHEDULER_OPTIONS, ...options };
  }

  async run(release: RenderedRelease, history: readonly ReleaseRecord[] = []): Promise<LifecycleResult> {
    const startTime = Date.now();
    const { identity } = release;
    const logger = getReleaseLogger(identity.name, identity.namespace, { revision: identity.revision });
    const machine = new LifecycleStateMachine();
    const applied: ResourceRef[] = [];

    const emit = (event: Omit<LifecycleEvent, 'revision' | 'timestamp'>): void => {
      this.options.progressCallback?.({ ...event, revision: identity.revision, timestamp: new Date() });
    };
    const enter = (state: LifecycleState, message: string): void => {
      const from = machine.transition(state);
      logger.debug('Lifecycle transition', { from, to: state });
      emit({ type: 'state-changed', state, message, details: { from } });
    };
    const apply = async (manifest: ResourceManifest): Promise<void> => {
      await this.driver.apply(manifest);
      applied.push(toResourceRef(manifest));
      emit({
        type: 'resource-applied',
        resourceId: manifest.id,
        message: `Applied ${manifest.kind}/${manifest.name}`,
      });
    };

    const hook = release.manifests.find((manifest) => manifest.hookPhase !== 'none');
    const foundation = release.manifests.filter((manifest) => manifest.hookPhase === 'none' && !isWorkload(manifest));
    const workloads = release.manifests
      .filter((manifest) => manifest.hookPhase === 'none' && isWorkload(manifest))
      .sort((a, b) => workloadOrder(a) - workloadOrder(b));

    await this.driver.ensureNamespace(identity.namespace);
    for (const manifest of foundation) {
      await apply(manifest);
    }

    let migration: MigrationOutcome;
    let graceDeadline: number | undefined;

    if (!hook) {
      migration = { status: 'disabled' };
      enter('WorkloadRollout', 'No migration task rendered; rolling out workloads');
    } else if (lastSuccessfulMigrationChecksum(history) === hook.checksum) {
      migration = { status: 'skipped', checksum: hook.checksum, taskName: hook.name };
      emit({
        type: 'migration-skipped',
        resourceId: hook.id,
        message: `Migration checksum ${hook.checksum.slice(0, 12)} already applied; skipping ${hook.name}`,
      });
      enter('MigrationSucceeded', 'Migration already applied');
      enter('WorkloadRollout', 'Rolling out workloads');
    } else {
      enter('MigrationPending', `Preparing migration task ${hook.name}`);
      const observed = await this.observeMigration(hook, identity.revision);

      if (observed.kind === 'reuse') {
        emit({
          type: 'migration-observed',
          resourceId: hook.id,
          message: `Migration task ${hook.name} for revision ${identity.revision} is already ${observed.phase}`,
          details: { phase: observed.phase },
        });
      } else {
        if (observed.kind === 'stale') {
          await this.deleteMigration(hook, identity.revision, observed.reason, emit);
        }
        await this.driver.apply(hook);
        emit({
          type: 'migration-created',
          resourceId: hook.id,
          message: `Created migration task ${hook.name}`,
        });
      }
      enter('MigrationRunning', `Waiting for migration task ${hook.name}`);

      const result = await this.waitForMigration(hook);
      if (result.phase === 'failed') {
        migration = {
          status: 'failed',
          checksum: hook.checksum,
          taskName: hook.name,
          reason: result.reason,
          message: result.message,
        };
        enter('MigrationFailed', result.message);

        if (this.options.retainOnFailure) {
          applied.push(toResourceRef(hook));
          emit({
            type: 'migration-retained',
            resourceId: hook.id,
            message: `Retained failed migration task ${hook.name} for inspection`,
          });
        } else {
          await this.deleteMigration(hook, identity.revision, 'migration failed', emit);
        }
        emit({ type: 'failed', message: result.message, state: 'MigrationFailed' });
        logger.warn('Migration failed', { reason: result.reason, task: hook.name });

        return {
          state: 'MigrationFailed',
          applied,
          migration,
          states: machine.history,
          duration: Date.now() - startTime,
        };
      }

      migration = { status: 'succeeded', checksum: hook.checksum, taskName: hook.name };
      graceDeadline = Date.now() + this.options.successGraceMs;
      enter('MigrationSucceeded', `Migration task ${hook.name} succeeded`);
      enter('WorkloadRollout', 'Rolling out workloads');
    }

    for (const manifest of workloads) {
      await apply(manifest);
    }

    if (this.options.waitForReady) {
      const waiter = new ResourceReadinessWaiter(this.driver, {
        timeout: this.options.rolloutTimeoutMs,
        initialDelay: this.options.pollIntervalMs,
        maxDelay: Math.max(this.options.pollIntervalMs * 5, this.options.pollIntervalMs),
        backoffMultiplier: 1.5,
      });
      for (const manifest of workloads) {
        const status = await waiter.waitForReady(manifest);
        emit({
          type: 'resource-ready',
          resourceId: manifest.id,
          message: status.message ?? `${manifest.kind}/${manifest.name} is ready`,
        });
      }
    }

    if (hook && graceDeadline !== undefined) {
      if (this.options.retainOnSuccess) {
        applied.push(toResourceRef(hook));
        emit({
          type: 'migration-retained',
          resourceId: hook.id,
          message: `Retained migration task ${hook.name}`,
        });
      } else {
        await delay(Math.max(0, graceDeadline - Date.now()));
        await this.deleteMigration(hook, identity.revision, 'success grace window elapsed', emit);
      }
    }

    enter('Complete', `Release ${identity.name} revision ${identity.revision} is deployed`);
    emit({ type: 'completed', state: 'Complete', message: `Deployed ${applied.length} resources` });

    return {
      state: 'Complete',
      applied,
      migration,
      states: machine.history,
      duration: Date.now() - startTime,
    };
  }

  /**
   * Decide what to do with a migration task left in the cluster. Only a task
   * rendered for this revision is reused, and a succeeded one only when it
   * ran the same migration settings.
   */
  private async observeMigration(hook: ResourceManifest, revision: number): Promise<ObservedMigration> {
    const live = await this.driver.read(toResourceRef(hook));
    if (!live) {
      return { kind: 'absent' };
    }

    const liveRevision = stringAt(live, 'metadata', 'annotations', ANNOTATIONS.revision);
    const liveChecksum = stringAt(live, 'metadata', 'annotations', ANNOTATIONS.settingsChecksum);
    const phase = jobPhase(live);

    if (liveRevision !== String(revision)) {
      return { kind: 'stale', reason: `left over from revision ${liveRevision ?? 'unknown'}` };
    }
    if (phase === 'pending' || phase === 'running') {
      return { kind: 'reuse', phase };
    }
    if (phase === 'succeeded' && liveChecksum === hook.checksum) {
      return { kind: 'reuse', phase };
    }
    return { kind: 'stale', reason: `previous attempt ${phase}` };
  }

  private async deleteMigration(
    hook: ResourceManifest,
    revision: number,
    reason: string,
    emit: (event: Omit<LifecycleEvent, 'revision' | 'timestamp'>) => void
  ): Promise<void> {
    const ref = toResourceRef(hook);
    await this.driver.delete(ref);

    // Background deletion; the name is only free once the object is gone
    const deadline = Date.now() + this.options.migrationTimeoutMs;
    while ((await this.driver.read(ref)) !== undefined) {
      if (Date.now() >= deadline) {
        throw new MigrationFailedError(
          `Migration task ${hook.name} was still terminating after ${this.options.migrationTimeoutMs}ms`,
          'Timeout',
          hook.name,
          revision
        );
      }
      await delay(this.options.pollIntervalMs);
    }

    emit({
      type: 'migration-deleted',
      resourceId: hook.id,
      message: `Deleted migration task ${hook.name} (${reason})`,
    });
  }

  private async waitForMigration(
    hook: ResourceManifest
  ): Promise<{ phase: 'succeeded' } | { phase: 'failed'; reason: MigrationFailureReason; message: string }> {
    const ref = toResourceRef(hook);
    const deadline = Date.now() + this.options.migrationTimeoutMs;

    for (;;) {
      const live = await this.driver.read(ref);
      const phase: MigrationPhase = live ? jobPhase(live) : 'pending';

      if (phase === 'succeeded') {
        return { phase };
      }
      if (phase === 'failed') {
        return {
          phase,
          reason: 'TaskFailed',
          message: `Migration task ${hook.name} exited with a non-zero status`,
        };
      }
      if (Date.now() >= deadline) {
        return {
          phase: 'failed',
          reason: 'Timeout',
          message: `Migration task ${hook.name} did not finish within ${this.options.migrationTimeoutMs}ms`,
        };
      }
      await delay(this.options.pollIntervalMs);
    }
  }
}
