import type { ComponentRenderer } from '../../core/rendering/index.js';
import type { ResourceManifest } from '../../core/types/index.js';
import { horizontalPodAutoscaler } from '../../factories/index.js';
import type { ChartContext } from '../context.js';
import { describeResource } from '../metadata.js';

const COMPONENT = 'autoscaling-policy';

function render(context: ChartContext): ResourceManifest[] {
  const { minReplicas, maxReplicas, targetCPUUtilizationPercentage } = context.settings.autoscaling;
  const policy = describeResource(context, COMPONENT, 'app');

  return [
    horizontalPodAutoscaler(
      {
        metadata: policy.metadata,
        spec: {
          scaleTargetRef: { apiVersion: 'apps/v1', kind: 'Deployment', name: context.names.app },
          minReplicas,
          maxReplicas,
          metrics: [
            {
              type: 'Resource',
              resource: {
                name: 'cpu',
                target: { type: 'Utilization', averageUtilization: targetCPUUtilizationPercentage },
              },
            },
          ],
        },
      },
      policy.placement
    ),
  ];
}

export const autoscalingComponent: ComponentRenderer<ChartContext> = {
  enabled: (context) => context.settings.autoscaling.enabled,
  render,
};
