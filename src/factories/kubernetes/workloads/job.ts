import type { KubernetesObject, V1Job } from '@kubernetes/client-node';
import { registerReadinessEvaluator } from '../../../core/readiness/index.js';
import type {
  MigrationPhase,
  ResourceManifest,
  ResourcePlacement,
  ResourceStatus,
} from '../../../core/types/index.js';
import { arrayAt, numberAt, stringAt } from '../../../utils/index.js';
import { createResource, type Payload, type ResourceInput } from '../../shared.js';

export type JobPayload = Payload<V1Job>;

// Kubernetes default when spec.backoffLimit is unset
const DEFAULT_BACKOFF_LIMIT = 6;

function hasCondition(liveResource: KubernetesObject, conditionType: string): boolean {
  return arrayAt(liveResource, 'status', 'conditions').some(
    (condition) => stringAt(condition, 'type') === conditionType && stringAt(condition, 'status') === 'True'
  );
}

/**
 * Phase of a one-shot Job. A Job with no partial-success state is either
 * still pending or running, or has reached exactly one terminal phase.
 */
export function jobPhase(liveResource: KubernetesObject): MigrationPhase {
  if (hasCondition(liveResource, 'Failed')) return 'failed';
  if (hasCondition(liveResource, 'Complete')) return 'succeeded';

  const completions = numberAt(liveResource, 'spec', 'completions') ?? 1;
  const backoffLimit = numberAt(liveResource, 'spec', 'backoffLimit') ?? DEFAULT_BACKOFF_LIMIT;
  const succeeded = numberAt(liveResource, 'status', 'succeeded') ?? 0;
  const failed = numberAt(liveResource, 'status', 'failed') ?? 0;
  const active = numberAt(liveResource, 'status', 'active') ?? 0;

  if (succeeded >= completions) return 'succeeded';
  if (failed > backoffLimit) return 'failed';
  if (active > 0 || failed > 0) return 'running';
  return 'pending';
}

export const jobReadiness = registerReadinessEvaluator(
  'Job',
  (liveResource): ResourceStatus => {
    const phase = jobPhase(liveResource);
    const details = {
      succeeded: numberAt(liveResource, 'status', 'succeeded') ?? 0,
      failed: numberAt(liveResource, 'status', 'failed') ?? 0,
      active: numberAt(liveResource, 'status', 'active') ?? 0,
    };

    switch (phase) {
      case 'succeeded':
        return { ready: true, message: `Job completed: ${details.succeeded} succeeded` };
      case 'failed':
        return {
          ready: false,
          reason: 'JobFailed',
          message: `Job failed: ${details.failed} failed pods`,
          details,
        };
      default:
        return {
          ready: false,
          reason: 'JobInProgress',
          message: `Job ${phase}: ${details.active} active, ${details.failed} failed`,
          details,
        };
    }
  },
  'job'
);

export function job(resource: ResourceInput<V1Job>, placement: ResourcePlacement): ResourceManifest<JobPayload> {
  return createResource(
    {
      ...resource,
      apiVersion: 'batch/v1',
      kind: 'Job',
    },
    placement
  );
}
