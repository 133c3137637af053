/**
 * Kubernetes Release Driver
 *
 * Applies manifests through the generic object API and keeps one Secret per
 * release revision as the release history.
 */

import {
  type CoreV1Api,
  type KubernetesObject,
  type KubernetesObjectApi,
  PatchStrategy,
  type V1PodList,
  type V1Secret,
} from '@kubernetes/client-node';
import {
  decodeReleaseRecord,
  encodeReleaseRecord,
  type LogRequest,
  type PodLog,
  RELEASE_RECORD_OWNER,
  type ReleaseDriver,
  releaseRecordName,
} from '../driver/index.js';
import { getComponentLogger } from '../logging/index.js';
import { MANAGED_BY, toLabelSelector } from '../naming/index.js';
import type { ReleaseRecord, ResourceManifest, ResourceRef } from '../types/index.js';
import { decodeBase64, encodeBase64 } from '../../utils/index.js';
import { isConflictError, isNotFoundError, toDriverError } from './errors.js';

const RECORD_DATA_KEY = 'release';

/** The object API calls the driver makes */
export type ObjectApiClient = Pick<KubernetesObjectApi, 'read' | 'patch' | 'delete'>;

/** The core API calls the driver makes */
export type CoreApiClient = Pick<
  CoreV1Api,
  | 'readNamespace'
  | 'createNamespace'
  | 'listNamespacedSecret'
  | 'createNamespacedSecret'
  | 'replaceNamespacedSecret'
  | 'deleteCollectionNamespacedSecret'
  | 'listNamespacedPod'
  | 'readNamespacedPodLog'
>;

export interface KubernetesReleaseDriverOptions {
  objectApi: ObjectApiClient;
  coreApi: CoreApiClient;
}

function recordLabels(releaseName: string, revision?: number, status?: string): Record<string, string> {
  return {
    owner: RELEASE_RECORD_OWNER,
    name: releaseName,
    ...(revision !== undefined ? { version: String(revision) } : {}),
    ...(status !== undefined ? { status } : {}),
  };
}

function header(ref: ResourceRef): KubernetesObject & { metadata: { name: string; namespace: string } } {
  return {
    apiVersion: ref.apiVersion,
    kind: ref.kind,
    metadata: { name: ref.name, namespace: ref.namespace },
  };
}

export class KubernetesReleaseDriver implements ReleaseDriver {
  private readonly logger = getComponentLogger('kubernetes-release-driver');
  private readonly objectApi: ObjectApiClient;
  private readonly coreApi: CoreApiClient;

  constructor(options: KubernetesReleaseDriverOptions) {
    this.objectApi = options.objectApi;
    this.coreApi = options.coreApi;
  }

  async ensureNamespace(namespace: string): Promise<void> {
    try {
      await this.coreApi.readNamespace({ name: namespace });
      return;
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw toDriverError('readNamespace', error);
      }
    }

    try {
      await this.coreApi.createNamespace({ body: { metadata: { name: namespace } } });
      this.logger.info('Created namespace', { namespace });
    } catch (error) {
      // Created concurrently by someone else
      if (!isConflictError(error)) {
        throw toDriverError('createNamespace', error);
      }
    }
  }

  async apply(manifest: ResourceManifest): Promise<void> {
    const existing = await this.read(manifest);
    // Manifests are frozen; the client gets its own copy
    const body = structuredClone(manifest.payload);

    // Server-side apply: fields this manager set earlier and the manifest no
    // longer renders are removed from the live object
    try {
      await this.objectApi.patch(body, undefined, undefined, MANAGED_BY, true, PatchStrategy.ServerSideApply);
    } catch (error) {
      throw toDriverError(`apply ${manifest.kind}/${manifest.name}`, error);
    }
    this.logger.debug('Applied resource', {
      kind: manifest.kind,
      name: manifest.name,
      action: existing ? 'patched' : 'created',
    });
  }

  async read(ref: ResourceRef): Promise<KubernetesObject | undefined> {
    try {
      return await this.objectApi.read(header(ref));
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw toDriverError(`read ${ref.kind}/${ref.name}`, error);
    }
  }

  async delete(ref: ResourceRef): Promise<boolean> {
    try {
      await this.objectApi.delete(header(ref), undefined, undefined, undefined, undefined, 'Background');
      return true;
    } catch (error) {
      if (isNotFoundError(error)) {
        return false;
      }
      throw toDriverError(`delete ${ref.kind}/${ref.name}`, error);
    }
  }

  async listReleaseRecords(releaseName: string, namespace: string): Promise<ReleaseRecord[]> {
    let items: V1Secret[];
    try {
      const list = await this.coreApi.listNamespacedSecret({
        namespace,
        labelSelector: toLabelSelector(recordLabels(releaseName)),
      });
      items = list.items;
    } catch (error) {
      throw toDriverError('listReleaseRecords', error);
    }

    return items
      .map((item) => {
        const source = item.metadata?.name ?? 'unnamed';
        const content = item.data?.[RECORD_DATA_KEY];
        return decodeReleaseRecord(content === undefined ? '' : decodeBase64(content), source);
      })
      .sort((a, b) => a.revision - b.revision);
  }

  async writeReleaseRecord(record: ReleaseRecord): Promise<void> {
    const name = releaseRecordName(record.releaseName, record.revision);
    const body: V1Secret = {
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: {
        name,
        namespace: record.namespace,
        labels: recordLabels(record.releaseName, record.revision, record.status),
      },
      type: `${RELEASE_RECORD_OWNER}.io/release.v1`,
      data: { [RECORD_DATA_KEY]: encodeBase64(encodeReleaseRecord(record)) },
    };

    try {
      await this.coreApi.createNamespacedSecret({ namespace: record.namespace, body });
    } catch (error) {
      if (!isConflictError(error)) {
        throw toDriverError('writeReleaseRecord', error);
      }
      try {
        await this.coreApi.replaceNamespacedSecret({ name, namespace: record.namespace, body });
      } catch (replaceError) {
        throw toDriverError('writeReleaseRecord', replaceError);
      }
    }
  }

  async deleteReleaseRecords(releaseName: string, namespace: string): Promise<void> {
    try {
      await this.coreApi.deleteCollectionNamespacedSecret({
        namespace,
        labelSelector: toLabelSelector(recordLabels(releaseName)),
      });
    } catch (error) {
      throw toDriverError('deleteReleaseRecords', error);
    }
  }

  async readLogs(request: LogRequest): Promise<PodLog[]> {
    let pods: V1PodList;
    try {
      pods = await this.coreApi.listNamespacedPod({
        namespace: request.namespace,
        labelSelector: request.labelSelector,
      });
    } catch (error) {
      throw toDriverError('listPods', error);
    }

    const logs: PodLog[] = [];
    for (const pod of pods.items) {
      const podName = pod.metadata?.name;
      if (!podName) continue;
      const containers = [...(pod.spec?.initContainers ?? []), ...(pod.spec?.containers ?? [])];
      for (const container of containers) {
        try {
          const content = await this.coreApi.readNamespacedPodLog({
            name: podName,
            namespace: request.namespace,
            container: container.name,
            ...(request.tailLines !== undefined ? { tailLines: request.tailLines } : {}),
          });
          logs.push({ pod: podName, container: container.name, content });
        } catch (error) {
          throw toDriverError(`readLogs ${podName}/${container.name}`, error);
        }
      }
    }
    return logs;
  }
}
