import type { V1Ingress } from '@kubernetes/client-node';
import type { ResourceManifest, ResourcePlacement } from '../../../core/types/index.js';
import { createResource, type Payload, type ResourceInput } from '../../shared.js';

export type IngressPayload = Payload<V1Ingress>;

export function ingress(
  resource: ResourceInput<V1Ingress>,
  placement: ResourcePlacement
): ResourceManifest<IngressPayload> {
  return createResource(
    {
      ...resource,
      apiVersion: 'networking.k8s.io/v1',
      kind: 'Ingress',
    },
    placement
  );
}
