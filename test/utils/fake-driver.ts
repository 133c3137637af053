/**
 * In-process release driver for tests. Stores applied objects in memory and
 * simulates the status the cluster would report for them.
 */

import type { KubernetesObject } from '@kubernetes/client-node';
import type { LogRequest, PodLog, ReleaseDriver } from '../../src/core/driver/index.js';
import { DriverError } from '../../src/core/errors.js';
import type { ReleaseRecord, ResourceManifest, ResourceRef } from '../../src/core/types/index.js';
import { numberAt } from '../../src/utils/index.js';

export type MigrationScript = 'succeed' | 'fail' | 'hang';

export interface FakeDriverOptions {
  migration?: MigrationScript;
  /** Reads of a running Job before it reports its outcome */
  pollsUntilDone?: number;
  /** Whether applied workloads report ready replicas */
  workloadsReady?: boolean;
  /** Deleted objects stay readable, as if stuck terminating */
  deletesHang?: boolean;
}

export interface DriverCall {
  operation: 'ensureNamespace' | 'apply' | 'read' | 'delete' | 'writeReleaseRecord' | 'deleteReleaseRecords';
  target: string;
}

type LiveObject = KubernetesObject & { status?: Record<string, unknown> };

function keyOf(ref: Pick<ResourceRef, 'kind' | 'namespace' | 'name'>): string {
  return `${ref.kind}/${ref.namespace}/${ref.name}`;
}

export class FakeReleaseDriver implements ReleaseDriver {
  readonly objects = new Map<string, LiveObject>();
  readonly calls: DriverCall[] = [];
  records: ReleaseRecord[] = [];
  readonly logs: PodLog[] = [];
  readonly logRequests: LogRequest[] = [];
  /** Operations that throw a DriverError, keyed by `operation` or `operation:Kind` */
  readonly failures = new Set<string>();

  migration: MigrationScript;
  private readonly pollsUntilDone: number;
  private readonly workloadsReady: boolean;
  private readonly deletesHang: boolean;
  private readonly jobReads = new Map<string, number>();

  constructor(options: FakeDriverOptions = {}) {
    this.migration = options.migration ?? 'succeed';
    this.pollsUntilDone = options.pollsUntilDone ?? 1;
    this.workloadsReady = options.workloadsReady ?? true;
    this.deletesHang = options.deletesHang ?? false;
  }

  /** Targets of every call of one operation, in order */
  targets(operation: DriverCall['operation']): string[] {
    return this.calls.filter((call) => call.operation === operation).map((call) => call.target);
  }

  /** Put an object into the fake cluster without going through apply */
  seed(object: LiveObject & { metadata: { name: string; namespace: string } }): void {
    this.objects.set(
      keyOf({ kind: object.kind ?? '', namespace: object.metadata.namespace, name: object.metadata.name }),
      object
    );
  }

  async ensureNamespace(namespace: string): Promise<void> {
    this.record('ensureNamespace', namespace);
  }

  async apply(manifest: ResourceManifest): Promise<void> {
    this.record('apply', `${manifest.kind}/${manifest.name}`, manifest.kind);
    const object: LiveObject = structuredClone(manifest.payload);
    const status = this.simulateStatus(manifest);
    if (status) {
      object.status = status;
    }
    this.objects.set(keyOf(manifest), object);
  }

  async read(ref: ResourceRef): Promise<KubernetesObject | undefined> {
    this.record('read', `${ref.kind}/${ref.name}`, ref.kind);
    const key = keyOf(ref);
    const object = this.objects.get(key);
    if (object && ref.kind === 'Job') {
      const reads = (this.jobReads.get(key) ?? 0) + 1;
      this.jobReads.set(key, reads);
      if (reads >= this.pollsUntilDone && numberAt(object, 'status', 'active') !== undefined) {
        object.status = this.finishedJobStatus(object.status);
      }
    }
    return object;
  }

  async delete(ref: ResourceRef): Promise<boolean> {
    this.record('delete', `${ref.kind}/${ref.name}`, ref.kind);
    if (this.deletesHang) {
      return this.objects.has(keyOf(ref));
    }
    this.jobReads.delete(keyOf(ref));
    return this.objects.delete(keyOf(ref));
  }

  async listReleaseRecords(releaseName: string, namespace: string): Promise<ReleaseRecord[]> {
    return this.records
      .filter((record) => record.releaseName === releaseName && record.namespace === namespace)
      .sort((a, b) => a.revision - b.revision);
  }

  async writeReleaseRecord(record: ReleaseRecord): Promise<void> {
    this.record('writeReleaseRecord', `${record.releaseName}.v${record.revision}:${record.status}`);
    this.records = [
      ...this.records.filter(
        (existing) =>
          !(
            existing.releaseName === record.releaseName &&
            existing.namespace === record.namespace &&
            existing.revision === record.revision
          )
      ),
      structuredClone(record),
    ];
  }

  async deleteReleaseRecords(releaseName: string, namespace: string): Promise<void> {
    this.record('deleteReleaseRecords', releaseName);
    this.records = this.records.filter(
      (record) => !(record.releaseName === releaseName && record.namespace === namespace)
    );
  }

  async readLogs(request: LogRequest): Promise<PodLog[]> {
    this.logRequests.push(request);
    return this.logs;
  }

  private record(operation: DriverCall['operation'], target: string, kind?: string): void {
    if (this.failures.has(operation) || (kind !== undefined && this.failures.has(`${operation}:${kind}`))) {
      throw new DriverError(`${operation} ${target} failed: forbidden`, operation, 403);
    }
    this.calls.push({ operation, target });
  }

  private simulateStatus(manifest: ResourceManifest): Record<string, unknown> | undefined {
    const replicas = numberAt(manifest.payload, 'spec', 'replicas') ?? 1;
    switch (manifest.kind) {
      case 'Job':
        return { active: 1 };
      case 'Deployment':
        return this.workloadsReady
          ? { observedGeneration: 1, readyReplicas: replicas, availableReplicas: replicas, updatedReplicas: replicas }
          : { observedGeneration: 1, readyReplicas: 0, availableReplicas: 0, updatedReplicas: 0 };
      case 'StatefulSet':
        return { readyReplicas: replicas, currentReplicas: replicas, updatedReplicas: replicas };
      case 'HorizontalPodAutoscaler':
        return { currentReplicas: numberAt(manifest.payload, 'spec', 'minReplicas') ?? 1 };
      default:
        return undefined;
    }
  }

  private finishedJobStatus(current: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
    switch (this.migration) {
      case 'succeed':
        return { succeeded: 1, conditions: [{ type: 'Complete', status: 'True' }] };
      case 'fail':
        return { failed: 1, conditions: [{ type: 'Failed', status: 'True' }] };
      case 'hang':
        return current;
    }
  }
}
