import type { V1Deployment } from '@kubernetes/client-node';
import { registerReadinessEvaluator } from '../../../core/readiness/index.js';
import type { ResourceManifest, ResourcePlacement, ResourceStatus } from '../../../core/types/index.js';
import { numberAt } from '../../../utils/index.js';
import { createResource, type Payload, type ResourceInput } from '../../shared.js';

export type DeploymentPayload = Payload<V1Deployment>;

export const deploymentReadiness = registerReadinessEvaluator(
  'Deployment',
  (liveResource): ResourceStatus => {
    const expectedReplicas = numberAt(liveResource, 'spec', 'replicas') ?? 1;

    if (numberAt(liveResource, 'status', 'observedGeneration') === undefined) {
      return {
        ready: false,
        reason: 'StatusMissing',
        message: 'Deployment status not available yet',
        details: { expectedReplicas },
      };
    }

    const readyReplicas = numberAt(liveResource, 'status', 'readyReplicas') ?? 0;
    const availableReplicas = numberAt(liveResource, 'status', 'availableReplicas') ?? 0;
    const updatedReplicas = numberAt(liveResource, 'status', 'updatedReplicas') ?? 0;

    // >= rather than === so scaling events and rolling updates count as ready
    const ready =
      readyReplicas >= expectedReplicas &&
      availableReplicas >= expectedReplicas &&
      updatedReplicas >= expectedReplicas;

    if (ready) {
      return {
        ready: true,
        message: `Deployment has ${readyReplicas}/${expectedReplicas} ready replicas and ${availableReplicas}/${expectedReplicas} available replicas`,
      };
    }
    return {
      ready: false,
      reason: 'ReplicasNotReady',
      message: `Waiting for replicas: ${readyReplicas}/${expectedReplicas} ready, ${availableReplicas}/${expectedReplicas} available`,
      details: { expectedReplicas, readyReplicas, availableReplicas, updatedReplicas },
    };
  },
  'deployment'
);

export function deployment(
  resource: ResourceInput<V1Deployment>,
  placement: ResourcePlacement
): ResourceManifest<DeploymentPayload> {
  return createResource(
    {
      ...resource,
      apiVersion: 'apps/v1',
      kind: 'Deployment',
    },
    placement
  );
}
