/**
 * Network ingress component: the application Service and, when hosts are
 * configured, the Ingress routing to it.
 */

import type { ComponentRenderer } from '../../core/rendering/index.js';
import type { ResourceManifest } from '../../core/types/index.js';
import { ingress, service } from '../../factories/index.js';
import type { ChartContext } from '../context.js';
import { describeResource, selectorFor } from '../metadata.js';

const COMPONENT = 'network-ingress';

function render(context: ChartContext): ResourceManifest[] {
  const settings = context.settings.ingress;
  const serviceName = context.names.app;
  const servicePort = settings.service.port;

  const endpoint = describeResource(context, COMPONENT, 'app');
  const manifests: ResourceManifest[] = [
    service(
      {
        metadata: endpoint.metadata,
        spec: {
          type: settings.service.type,
          // Routes to the application's pods, not this component's
          selector: selectorFor(context, 'application'),
          ports: [{ name: 'http', port: servicePort, targetPort: 'http', protocol: 'TCP' }],
        },
      },
      endpoint.placement
    ),
  ];

  if (settings.hosts.length > 0) {
    const route = describeResource(context, COMPONENT, 'app', { annotations: settings.annotations });
    manifests.push(
      ingress(
        {
          metadata: route.metadata,
          spec: {
            ...(settings.className ? { ingressClassName: settings.className } : {}),
            rules: settings.hosts.map((host) => ({
              host: host.host,
              http: {
                paths: host.paths.map((path) => ({
                  path: path.path,
                  pathType: path.pathType,
                  backend: { service: { name: serviceName, port: { number: servicePort } } },
                })),
              },
            })),
            ...(settings.tls.length > 0
              ? { tls: settings.tls.map((tls) => ({ secretName: tls.secretName, hosts: [...tls.hosts] })) }
              : {}),
          },
        },
        route.placement
      )
    );
  }

  return manifests;
}

export const networkIngressComponent: ComponentRenderer<ChartContext> = {
  enabled: (context) => context.settings.ingress.enabled,
  render,
};
