import type { V1ConfigMap } from '@kubernetes/client-node';
import type { ResourceManifest, ResourcePlacement } from '../../../core/types/index.js';
import { createResource, type Payload, type ResourceInput } from '../../shared.js';

export type ConfigMapPayload = Payload<V1ConfigMap>;

// ConfigMaps have data at the root level and no readiness beyond existing
export function configMap(
  resource: ResourceInput<V1ConfigMap>,
  placement: ResourcePlacement
): ResourceManifest<ConfigMapPayload> {
  return createResource(
    {
      ...resource,
      apiVersion: 'v1',
      kind: 'ConfigMap',
    },
    placement
  );
}
