import type { V2HorizontalPodAutoscaler } from '@kubernetes/client-node';
import { registerReadinessEvaluator } from '../../../core/readiness/index.js';
import type { ResourceManifest, ResourcePlacement, ResourceStatus } from '../../../core/types/index.js';
import { numberAt } from '../../../utils/index.js';
import { createResource, type Payload, type ResourceInput } from '../../shared.js';

export type HorizontalPodAutoscalerPayload = Payload<V2HorizontalPodAutoscaler>;

export const horizontalPodAutoscalerReadiness = registerReadinessEvaluator(
  'HorizontalPodAutoscaler',
  (liveResource): ResourceStatus => {
    // Active once the controller has observed the target's replica count
    const currentReplicas = numberAt(liveResource, 'status', 'currentReplicas');
    if (currentReplicas === undefined) {
      return {
        ready: false,
        reason: 'MetricsUnavailable',
        message: 'HPA is not yet able to read metrics',
      };
    }
    return { ready: true, message: `HPA is active with ${currentReplicas} current replicas` };
  },
  'horizontalPodAutoscaler'
);

export function horizontalPodAutoscaler(
  resource: ResourceInput<V2HorizontalPodAutoscaler>,
  placement: ResourcePlacement
): ResourceManifest<HorizontalPodAutoscalerPayload> {
  return createResource(
    {
      ...resource,
      apiVersion: 'autoscaling/v2',
      kind: 'HorizontalPodAutoscaler',
    },
    placement
  );
}
