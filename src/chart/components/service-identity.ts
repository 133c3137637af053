import type { ComponentRenderer } from '../../core/rendering/index.js';
import type { ResourceManifest } from '../../core/types/index.js';
import { serviceAccount } from '../../factories/index.js';
import type { ChartContext } from '../context.js';
import { describeResource } from '../metadata.js';

const COMPONENT = 'service-identity';

function render(context: ChartContext): ResourceManifest[] {
  const settings = context.settings.serviceAccount;
  const identity = describeResource(context, COMPONENT, 'app', {
    annotations: settings.annotations,
  });

  return [
    serviceAccount(
      {
        metadata: { ...identity.metadata, name: context.serviceAccountName ?? context.names.app },
        automountServiceAccountToken: settings.automountToken,
      },
      identity.placement
    ),
  ];
}

export const serviceIdentityComponent: ComponentRenderer<ChartContext> = {
  enabled: (context) => context.settings.serviceAccount.enabled,
  render,
};
