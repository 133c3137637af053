/**
 * Manifest and readiness types
 */

import type { KubernetesObject, V1ObjectMeta } from '@kubernetes/client-node';
import type { Component } from './release.js';

export type HookPhase = 'none' | 'pre-install' | 'pre-upgrade';

/**
 * A complete Kubernetes object with the fields every manifest must carry
 */
export interface ManifestPayload extends KubernetesObject {
  apiVersion: string;
  kind: string;
  metadata: V1ObjectMeta;
}

/**
 * One declarative object description submitted to the orchestrator.
 * Produced by the factories and deep-frozen; never edited in place.
 */
export interface ResourceManifest<TPayload extends ManifestPayload = ManifestPayload> {
  /** Deterministic camelCase identifier, stable across releases */
  readonly id: string;
  readonly apiVersion: string;
  readonly kind: string;
  readonly name: string;
  readonly namespace: string;
  readonly labels: Readonly<Record<string, string>>;
  readonly annotations: Readonly<Record<string, string>>;
  readonly ownerComponent: Component;
  readonly hookPhase: HookPhase;
  /**
   * Checksum of the rendered object without its per-revision annotations.
   * Changes whenever any setting the object is built from changes.
   */
  readonly checksum: string;
  readonly payload: TPayload;
}

/**
 * How a payload is placed in the release: owner and hook phase
 */
export interface ResourcePlacement {
  component: Component;
  /** Component-local name (without the release prefix) the manifest ID derives from */
  localName: string;
  hookPhase?: HookPhase;
}

/**
 * Address of an object in the cluster
 */
export interface ResourceRef {
  apiVersion: string;
  kind: string;
  name: string;
  namespace: string;
}

/**
 * Structured resource status for detailed readiness information
 */
export interface ResourceStatus {
  ready: boolean;
  /** Machine-readable reason code */
  reason?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type ReadinessEvaluator = (liveResource: KubernetesObject) => ResourceStatus;

export function toResourceRef(manifest: ResourceManifest): ResourceRef {
  return {
    apiVersion: manifest.apiVersion,
    kind: manifest.kind,
    name: manifest.name,
    namespace: manifest.namespace,
  };
}
