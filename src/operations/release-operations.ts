/**
 * Release Operations
 *
 * The library surface behind every CLI command. Each operation resolves the
 * settings, renders the chart and talks to the cluster only through the
 * release driver.
 */

import {
  catApiChart,
  componentSelector,
  DEFAULT_NAMESPACE,
  DEFAULT_RELEASE_NAME,
  readChartSettings,
  render,
} from '../chart/index.js';
import {
  latestDeployedRecord,
  latestRecord,
  type PodLog,
  type ReleaseDriver,
  recordedResources,
} from '../core/driver/index.js';
import {
  MigrationFailedError,
  type OperationPhase,
  ReleaseStateError,
  toError,
  withPhase,
} from '../core/errors.js';
import {
  type LifecycleResult,
  LifecycleScheduler,
  ReleaseTeardown,
  type SchedulerOptions,
} from '../core/lifecycle/index.js';
import { getReleaseLogger } from '../core/logging/index.js';
import { toLabelSelector } from '../core/naming/index.js';
import { evaluateReadiness } from '../core/readiness/index.js';
import type { RenderedRelease } from '../core/rendering/index.js';
import { serializeManifests, valuesToYaml } from '../core/serialization/index.js';
import { loadValuesFile, parseSetExpressions, resolve, type SettingsScope, type SettingsTree } from '../core/settings/index.js';
import {
  type Component,
  type LifecycleEvent,
  type MigrationOutcome,
  type ReleaseIdentity,
  type ReleaseRecord,
  type ResourceRef,
  toResourceRef,
} from '../core/types/index.js';
import { lintRelease } from './lint.js';
import type {
  DeployRequest,
  DeployResult,
  DryRunRequest,
  DryRunResult,
  LintResult,
  LogsRequest,
  ReleaseRequest,
  ResourceStatusReport,
  StatusResult,
  UninstallResult,
  UpgradeRequest,
} from './types.js';

export interface ReleaseOperationsOptions {
  /** The driver, or a factory called the first time the cluster is needed */
  driver: ReleaseDriver | (() => ReleaseDriver);
  /** Applied over the scheduler options derived from settings */
  scheduler?: Partial<SchedulerOptions> | undefined;
}

interface Target {
  namespace: string;
  releaseName: string;
}

function targetOf(request: ReleaseRequest): Target {
  return {
    namespace: request.namespace ?? DEFAULT_NAMESPACE,
    releaseName: request.releaseName ?? DEFAULT_RELEASE_NAME,
  };
}

async function inPhase<T>(phase: OperationPhase, action: () => T | Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    throw withPhase(error, phase);
  }
}

/**
 * Build the override scopes of a request: values files in order, then
 * `--set`, then `--set-secret`
 */
export function overrideScopes(request: ReleaseRequest): SettingsScope[] {
  return [
    ...(request.valuesFiles ?? []).map((file) => loadValuesFile(file)),
    parseSetExpressions(request.set ?? []),
    parseSetExpressions(request.setSecret ?? [], { sensitive: true }),
  ];
}

/**
 * Resolve and validate the settings of a request
 */
export function resolveSettings(request: ReleaseRequest): SettingsTree {
  const settings = resolve(catApiChart.defaultScopes, overrideScopes(request));
  readChartSettings(settings);
  return settings;
}

export class ReleaseOperations {
  private readonly driverSource: ReleaseDriver | (() => ReleaseDriver);
  private resolvedDriver: ReleaseDriver | undefined;
  private readonly schedulerOverrides: Partial<SchedulerOptions>;

  constructor(options: ReleaseOperationsOptions) {
    this.driverSource = options.driver;
    this.schedulerOverrides = options.scheduler ?? {};
  }

  private get driver(): ReleaseDriver {
    if (!this.resolvedDriver) {
      this.resolvedDriver = typeof this.driverSource === 'function' ? this.driverSource() : this.driverSource;
    }
    return this.resolvedDriver;
  }

  async install(request: DeployRequest = {}): Promise<DeployResult> {
    const target = targetOf(request);
    const settings = await inPhase('resolve', () => resolveSettings(request));
    const records = await inPhase('driver', () => this.driver.listReleaseRecords(target.releaseName, target.namespace));

    const deployed = latestDeployedRecord(records);
    if (deployed) {
      throw new ReleaseStateError(
        `Release '${target.releaseName}' is already deployed at revision ${deployed.revision}; use upgrade`,
        target.releaseName
      );
    }
    return this.deploy(target, settings, records, request);
  }

  async upgrade(request: UpgradeRequest = {}): Promise<DeployResult> {
    const target = targetOf(request);
    const settings = await inPhase('resolve', () => resolveSettings(request));
    const records = await inPhase('driver', () => this.driver.listReleaseRecords(target.releaseName, target.namespace));

    if (!latestDeployedRecord(records) && !request.install) {
      throw new ReleaseStateError(
        `Release '${target.releaseName}' has no deployed revision in namespace '${target.namespace}'; install it first`,
        target.releaseName
      );
    }
    return this.deploy(target, settings, records, request);
  }

  async uninstall(request: ReleaseRequest = {}): Promise<UninstallResult> {
    const target = targetOf(request);
    const logger = getReleaseLogger(target.releaseName, target.namespace);
    const records = await inPhase('driver', () => this.driver.listReleaseRecords(target.releaseName, target.namespace));

    const latest = latestRecord(records);
    if (!latest) {
      throw new ReleaseStateError(
        `Release '${target.releaseName}' not found in namespace '${target.namespace}'`,
        target.releaseName,
        'teardown'
      );
    }

    const teardown = await inPhase('teardown', () =>
      new ReleaseTeardown(this.driver).teardown(recordedResources(records), {
        releaseName: target.releaseName,
        revision: latest.revision,
      })
    );

    const recordsDeleted = teardown.errors.length === 0;
    if (recordsDeleted) {
      await inPhase('driver', () => this.driver.deleteReleaseRecords(target.releaseName, target.namespace));
    }
    logger.info('Uninstalled release', {
      status: teardown.status,
      deleted: teardown.deletedResources.length,
      errors: teardown.errors.length,
    });
    return { teardown, recordsDeleted };
  }

  async dryRun(request: DryRunRequest = {}): Promise<DryRunResult> {
    const target = targetOf(request);
    const settings = await inPhase('resolve', () => resolveSettings(request));
    const release = await inPhase('render', () =>
      render(settings, { name: target.releaseName, namespace: target.namespace, revision: request.revision ?? 1 })
    );
    return { release, yaml: serializeManifests(release.manifests) };
  }

  async lint(request: ReleaseRequest = {}): Promise<LintResult> {
    const target = targetOf(request);
    const settings = await inPhase('resolve', () => resolveSettings(request));
    const release = await inPhase('render', () =>
      render(settings, { name: target.releaseName, namespace: target.namespace, revision: 1 })
    );
    const findings = lintRelease(release, settings);
    return {
      passed: findings.every((finding) => finding.severity !== 'error'),
      findings,
    };
  }

  /**
   * The resolved settings as YAML, with every sensitive value redacted
   */
  async showValues(request: ReleaseRequest = {}): Promise<string> {
    const settings = await inPhase('resolve', () => resolveSettings(request));
    return valuesToYaml(settings.redacted());
  }

  async status(request: ReleaseRequest = {}): Promise<StatusResult> {
    const target = targetOf(request);
    const records = await inPhase('driver', () => this.driver.listReleaseRecords(target.releaseName, target.namespace));
    const record = latestRecord(records);
    if (!record) {
      throw new ReleaseStateError(
        `Release '${target.releaseName}' not found in namespace '${target.namespace}'`,
        target.releaseName,
        'status'
      );
    }

    const resources: ResourceStatusReport[] = [];
    for (const ref of record.resources) {
      const live = await inPhase('driver', () => this.driver.read(ref));
      resources.push({
        ref,
        status: live
          ? evaluateReadiness(live)
          : { ready: false, reason: 'NotFound', message: `${ref.kind}/${ref.name} does not exist` },
      });
    }

    return { record, resources, ready: resources.every((resource) => resource.status.ready) };
  }

  async logsApp(request: LogsRequest = {}): Promise<PodLog[]> {
    return this.logs(request, 'application');
  }

  async logsDb(request: LogsRequest = {}): Promise<PodLog[]> {
    return this.logs(request, 'database');
  }

  private async logs(request: LogsRequest, component: Component): Promise<PodLog[]> {
    const target = targetOf(request);
    return inPhase('logs', () =>
      this.driver.readLogs({
        namespace: target.namespace,
        labelSelector: toLabelSelector(componentSelector(target.releaseName, component)),
        ...(request.tailLines !== undefined ? { tailLines: request.tailLines } : {}),
      })
    );
  }

  private schedulerOptions(settings: SettingsTree, request: DeployRequest): Partial<SchedulerOptions> {
    const { migration } = readChartSettings(settings);
    const timeoutMs = request.timeoutSeconds !== undefined ? request.timeoutSeconds * 1000 : undefined;

    return {
      pollIntervalMs: migration.pollIntervalSeconds * 1000,
      migrationTimeoutMs: timeoutMs ?? migration.timeoutSeconds * 1000,
      ...(timeoutMs !== undefined ? { rolloutTimeoutMs: timeoutMs } : {}),
      successGraceMs: migration.retention.successGraceSeconds * 1000,
      retainOnSuccess: migration.retention.onSuccess === 'retain',
      retainOnFailure: migration.retention.onFailure === 'retain',
      waitForReady: request.wait ?? true,
      ...this.schedulerOverrides,
    };
  }

  private async deploy(
    target: Target,
    settings: SettingsTree,
    records: readonly ReleaseRecord[],
    request: DeployRequest
  ): Promise<DeployResult> {
    const revision = (latestDeployedRecord(records)?.revision ?? 0) + 1;
    const identity: ReleaseIdentity = { name: target.releaseName, namespace: target.namespace, revision };
    const logger = getReleaseLogger(identity.name, identity.namespace, { revision });

    const release = await inPhase('render', () => render(settings, identity));

    // Progress so far, recorded if the run is interrupted
    const byId = new Map(release.manifests.map((manifest) => [manifest.id, manifest]));
    const applied: ResourceRef[] = [];
    let migration: MigrationOutcome = { status: release.migrationChecksum ? 'failed' : 'disabled' };
    const observe = (event: LifecycleEvent): void => {
      const manifest = event.resourceId !== undefined ? byId.get(event.resourceId) : undefined;
      const submitted = ['resource-applied', 'migration-created', 'migration-observed'].includes(event.type);
      if (submitted && manifest && !applied.some((ref) => ref.kind === manifest.kind && ref.name === manifest.name)) {
        applied.push(toResourceRef(manifest));
      } else if (event.type === 'migration-skipped') {
        migration = { status: 'skipped', checksum: release.migrationChecksum };
      } else if (event.type === 'state-changed' && event.state === 'MigrationSucceeded' && migration.status !== 'skipped') {
        migration = { status: 'succeeded', checksum: release.migrationChecksum };
      }
      request.progressCallback?.(event);
    };

    const scheduler = new LifecycleScheduler(this.driver, {
      ...this.schedulerOptions(settings, request),
      progressCallback: observe,
    });

    let lifecycle: LifecycleResult;
    try {
      lifecycle = await scheduler.run(release, records);
    } catch (error) {
      const failure = withPhase(error, 'rollout');
      try {
        await this.writeRecord(release, {
          status: 'failed',
          resources: applied,
          migration: migration.status === 'failed' ? { ...migration, message: failure.describe() } : migration,
          description: request.description,
        });
      } catch (recordError) {
        logger.error('Failed to record failed release', toError(recordError), { failure: failure.describe() });
      }
      throw failure;
    }

    if (lifecycle.state === 'MigrationFailed') {
      await this.writeRecord(release, {
        status: 'failed',
        resources: lifecycle.applied,
        migration: lifecycle.migration,
        description: request.description,
      });
      const { reason = 'TaskFailed', taskName = '', message = 'Migration failed' } = lifecycle.migration;
      throw new MigrationFailedError(message, reason, taskName, revision);
    }

    const record = await this.writeRecord(release, {
      status: 'deployed',
      resources: lifecycle.applied,
      migration: lifecycle.migration,
      description: request.description ?? (revision === 1 ? 'Install complete' : 'Upgrade complete'),
    });

    for (const previous of records) {
      if (previous.status === 'deployed' && previous.revision !== revision) {
        await inPhase('driver', () => this.driver.writeReleaseRecord({ ...previous, status: 'superseded' }));
      }
    }

    logger.info('Release deployed', {
      migration: lifecycle.migration.status,
      resources: lifecycle.applied.length,
      duration: lifecycle.duration,
    });
    return { release, record, lifecycle };
  }

  private async writeRecord(
    release: RenderedRelease,
    fields: Pick<ReleaseRecord, 'status' | 'resources' | 'migration'> & { description?: string | undefined }
  ): Promise<ReleaseRecord> {
    const { identity } = release;
    const record: ReleaseRecord = {
      releaseName: identity.name,
      namespace: identity.namespace,
      revision: identity.revision,
      status: fields.status,
      resources: fields.resources,
      migration: fields.migration,
      settingsChecksum: release.settingsChecksum,
      updatedAt: new Date().toISOString(),
      ...(fields.description !== undefined ? { description: fields.description } : {}),
    };
    await inPhase('driver', () => this.driver.writeReleaseRecord(record));
    return record;
  }
}
