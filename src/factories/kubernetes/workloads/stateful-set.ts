import type { V1StatefulSet } from '@kubernetes/client-node';
import { registerReadinessEvaluator } from '../../../core/readiness/index.js';
import type { ResourceManifest, ResourcePlacement, ResourceStatus } from '../../../core/types/index.js';
import { numberAt, stringAt } from '../../../utils/index.js';
import { createResource, type Payload, type ResourceInput } from '../../shared.js';

export type StatefulSetPayload = Payload<V1StatefulSet>;

export const statefulSetReadiness = registerReadinessEvaluator(
  'StatefulSet',
  (liveResource): ResourceStatus => {
    const expectedReplicas = numberAt(liveResource, 'spec', 'replicas') ?? 1;
    const updateStrategy = stringAt(liveResource, 'spec', 'updateStrategy', 'type') ?? 'RollingUpdate';
    const readyReplicas = numberAt(liveResource, 'status', 'readyReplicas') ?? 0;
    const updatedReplicas = numberAt(liveResource, 'status', 'updatedReplicas') ?? 0;

    // OnDelete never updates pods on its own, so only readiness counts
    const ready =
      updateStrategy === 'OnDelete'
        ? readyReplicas >= expectedReplicas
        : readyReplicas >= expectedReplicas && updatedReplicas >= expectedReplicas;

    if (ready) {
      return {
        ready: true,
        message: `StatefulSet has ${readyReplicas}/${expectedReplicas} ready replicas`,
      };
    }
    return {
      ready: false,
      reason: 'ReplicasNotReady',
      message: `StatefulSet waiting for replicas: ${readyReplicas}/${expectedReplicas} ready, ${updatedReplicas}/${expectedReplicas} updated`,
      details: { expectedReplicas, readyReplicas, updatedReplicas, updateStrategy },
    };
  },
  'statefulSet'
);

export function statefulSet(
  resource: ResourceInput<V1StatefulSet>,
  placement: ResourcePlacement
): ResourceManifest<StatefulSetPayload> {
  return createResource(
    {
      ...resource,
      apiVersion: 'apps/v1',
      kind: 'StatefulSet',
    },
    placement
  );
}
