import { describe, expect, it } from 'vitest';
import { statefulSetReadiness } from '../../src/factories/index.js';

function liveStatefulSet(status: Record<string, unknown>, updateStrategy?: string) {
  return {
    apiVersion: 'apps/v1',
    kind: 'StatefulSet',
    metadata: { name: 'cat-api-release-postgres' },
    spec: { replicas: 1, ...(updateStrategy ? { updateStrategy: { type: updateStrategy } } : {}) },
    status,
  };
}

describe('StatefulSet readiness', () => {
  it('should be ready when the replica is ready and updated', () => {
    expect(statefulSetReadiness(liveStatefulSet({ readyReplicas: 1, updatedReplicas: 1 }))).toEqual({
      ready: true,
      message: 'StatefulSet has 1/1 ready replicas',
    });
  });

  it('should wait for the rolling update to reach the replica', () => {
    const status = statefulSetReadiness(liveStatefulSet({ readyReplicas: 1, updatedReplicas: 0 }));
    expect(status.ready).toBe(false);
    expect(status.message).toBe('StatefulSet waiting for replicas: 1/1 ready, 0/1 updated');
  });

  it('should only count ready replicas under the OnDelete strategy', () => {
    expect(statefulSetReadiness(liveStatefulSet({ readyReplicas: 1, updatedReplicas: 0 }, 'OnDelete')).ready).toBe(true);
  });
});
