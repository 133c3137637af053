import type { V1ServiceAccount } from '@kubernetes/client-node';
import type { ResourceManifest, ResourcePlacement } from '../../../core/types/index.js';
import { createResource, type Payload, type ResourceInput } from '../../shared.js';

export type ServiceAccountPayload = Payload<V1ServiceAccount>;

export function serviceAccount(
  resource: ResourceInput<V1ServiceAccount>,
  placement: ResourcePlacement
): ResourceManifest<ServiceAccountPayload> {
  return createResource(
    {
      ...resource,
      apiVersion: 'v1',
      kind: 'ServiceAccount',
    },
    placement
  );
}
