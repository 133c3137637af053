/**
 * Release Driver contract
 *
 * The engine emits instructions to the driver; the driver owns all cluster
 * state, including the release history. Driver failures surface as
 * DriverError and are never retried by the engine.
 */

import type { KubernetesObject } from '@kubernetes/client-node';
import type { ReleaseRecord, ResourceManifest, ResourceRef } from '../types/index.js';

export interface LogRequest {
  namespace: string;
  labelSelector: string;
  tailLines?: number;
}

export interface PodLog {
  pod: string;
  container: string;
  content: string;
}

export interface ReleaseDriver {
  ensureNamespace(namespace: string): Promise<void>;

  /** Create the object, or update it when it already exists */
  apply(manifest: ResourceManifest): Promise<void>;

  /** The live object, or undefined when it does not exist */
  read(ref: ResourceRef): Promise<KubernetesObject | undefined>;

  /** Delete with background propagation; false when the object was already gone */
  delete(ref: ResourceRef): Promise<boolean>;

  /** Every stored revision of a release, oldest first */
  listReleaseRecords(releaseName: string, namespace: string): Promise<ReleaseRecord[]>;

  writeReleaseRecord(record: ReleaseRecord): Promise<void>;

  deleteReleaseRecords(releaseName: string, namespace: string): Promise<void>;

  readLogs(request: LogRequest): Promise<PodLog[]>;
}
