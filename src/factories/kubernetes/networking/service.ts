import type { V1Service } from '@kubernetes/client-node';
import { registerReadinessEvaluator } from '../../../core/readiness/index.js';
import type { ResourceManifest, ResourcePlacement, ResourceStatus } from '../../../core/types/index.js';
import { arrayAt, stringAt } from '../../../utils/index.js';
import { createResource, type Payload, type ResourceInput } from '../../shared.js';

export type ServicePayload = Payload<V1Service>;

export const serviceReadiness = registerReadinessEvaluator(
  'Service',
  (liveResource): ResourceStatus => {
    const serviceType = stringAt(liveResource, 'spec', 'type') ?? 'ClusterIP';
    if (serviceType !== 'LoadBalancer') {
      return { ready: true, message: `${serviceType} service is ready` };
    }

    const endpoint = arrayAt(liveResource, 'status', 'loadBalancer', 'ingress')
      .map((entry) => stringAt(entry, 'ip') ?? stringAt(entry, 'hostname'))
      .find((address) => address !== undefined);
    if (endpoint) {
      return { ready: true, message: `LoadBalancer service has external endpoint: ${endpoint}` };
    }
    return {
      ready: false,
      reason: 'LoadBalancerPending',
      message: 'Waiting for LoadBalancer to assign external IP or hostname',
      details: { serviceType },
    };
  },
  'service'
);

export function service(
  resource: ResourceInput<V1Service>,
  placement: ResourcePlacement
): ResourceManifest<ServicePayload> {
  return createResource(
    {
      ...resource,
      apiVersion: 'v1',
      kind: 'Service',
    },
    placement
  );
}
