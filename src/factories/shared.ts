/**
 * Shared utilities for factory functions
 *
 * Every factory turns a Kubernetes object into a deep-frozen ResourceManifest
 * that records which component owns it, its hook phase and the checksum of
 * its rendered content.
 */

import type { KubernetesObject, V1ObjectMeta } from '@kubernetes/client-node';
import { ANNOTATIONS, REVISION_ANNOTATIONS } from '../core/naming/index.js';
import type { ManifestPayload, ResourceManifest, ResourcePlacement } from '../core/types/index.js';
import { checksumOf, deepFreeze, generateDeterministicResourceId } from '../utils/index.js';

/**
 * Object accepted by a factory; the factory supplies apiVersion and kind
 */
export type ResourceInput<T extends KubernetesObject> = Omit<T, 'apiVersion' | 'kind' | 'metadata'> & {
  metadata: V1ObjectMeta;
};

export type Payload<T extends KubernetesObject> = T & ManifestPayload;

/**
 * Checksum of everything the payload renders apart from the per-revision
 * annotations, so an unchanged object keeps its checksum across upgrades
 */
export function contentChecksum(payload: ManifestPayload): string {
  const annotations: Record<string, string> = { ...(payload.metadata.annotations ?? {}) };
  for (const key of REVISION_ANNOTATIONS) {
    delete annotations[key];
  }
  return checksumOf({ ...payload, metadata: { ...payload.metadata, annotations } });
}

export function createResource<TPayload extends ManifestPayload>(
  input: TPayload,
  placement: ResourcePlacement
): ResourceManifest<TPayload> {
  const checksum = contentChecksum(input);
  const payload = {
    ...input,
    metadata: {
      ...input.metadata,
      annotations: { ...(input.metadata.annotations ?? {}), [ANNOTATIONS.settingsChecksum]: checksum },
    },
  };
  const { name, namespace } = payload.metadata;
  if (!name) {
    throw new Error(`${payload.kind} '${placement.localName}' has no metadata.name`);
  }
  if (!namespace) {
    throw new Error(`${payload.kind} '${name}' has no metadata.namespace`);
  }

  return deepFreeze({
    id: generateDeterministicResourceId(payload.kind, placement.localName),
    apiVersion: payload.apiVersion,
    kind: payload.kind,
    name,
    namespace,
    labels: { ...(payload.metadata.labels ?? {}) },
    annotations: { ...(payload.metadata.annotations ?? {}) },
    ownerComponent: placement.component,
    hookPhase: placement.hookPhase ?? 'none',
    checksum,
    payload,
  });
}
