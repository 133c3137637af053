/**
 * Application component: ConfigMap, Secret and Deployment of the cat API
 */

import type { V1Container, V1PodSpec, V1Probe } from '@kubernetes/client-node';
import type { ComponentRenderer } from '../../core/rendering/index.js';
import type { ResourceManifest } from '../../core/types/index.js';
import { configMap, deployment, secret } from '../../factories/index.js';
import { checksumOf } from '../../utils/index.js';
import type { ChartContext } from '../context.js';
import { describeResource, imageReference, podLabels, pullSecrets, selectorFor } from '../metadata.js';
import { scopeConventions } from '../schema.js';
import {
  DATABASE_URL_KEY,
  DB_PASSWORD_KEY,
  DB_USER_KEY,
  databaseEnv,
  databaseUrl,
  waitForDatabaseContainer,
} from './database-client.js';

const COMPONENT = 'application';

interface ApplicationData {
  config: Record<string, string>;
  secret: Record<string, string>;
}

/**
 * Split application settings into plain configuration and secret values.
 * Env entries declared secret go to the Secret, never the ConfigMap.
 */
export function applicationData(context: ChartContext): ApplicationData {
  const { application, cache, database } = context.settings;
  const config: Record<string, string> = {};
  const secretData: Record<string, string> = {};
  for (const key of Object.keys(application.env).sort()) {
    const value = String(application.env[key]);
    if (context.tree.isSensitive(`application.env.${key}`)) {
      secretData[key] = value;
    } else {
      config[key] = value;
    }
  }

  config.CACHE_ENABLED = String(cache.enabled);
  config.REDIS_HOST = cache.host;
  config.REDIS_PORT = String(cache.port);
  config.REDIS_DB = String(cache.db);

  for (const key of Object.keys(application.secretEnv).sort()) {
    secretData[key] = String(application.secretEnv[key]);
  }
  secretData[DB_USER_KEY] = database.user;
  secretData[DB_PASSWORD_KEY] = database.password;
  secretData[DATABASE_URL_KEY] = databaseUrl(context);
  if (cache.password) {
    secretData.REDIS_PASSWORD = cache.password;
  }

  return { config, secret: secretData };
}

function httpProbe(context: ChartContext): V1Probe {
  const { probes } = context.settings.application;
  return {
    httpGet: { path: probes.path, port: 'http' },
    initialDelaySeconds: probes.initialDelaySeconds,
    periodSeconds: probes.periodSeconds,
  };
}

function applicationContainer(context: ChartContext): V1Container {
  const { application } = context.settings;
  const conventions = scopeConventions(context.tree, 'application');

  return {
    name: 'cat-api',
    image: imageReference(application.image, conventions.imageRegistry),
    imagePullPolicy: application.image.pullPolicy,
    ports: [{ name: 'http', containerPort: application.containerPort, protocol: 'TCP' }],
    env: databaseEnv(context),
    envFrom: [
      { configMapRef: { name: context.names.appConfig } },
      { secretRef: { name: context.names.appSecret } },
    ],
    resources: application.resources,
    ...(application.probes.enabled
      ? { livenessProbe: httpProbe(context), readinessProbe: httpProbe(context) }
      : {}),
  };
}

function render(context: ChartContext): ResourceManifest[] {
  const { application, autoscaling } = context.settings;
  const data = applicationData(context);
  const configHash = checksumOf(data.config);
  const secretHash = checksumOf(data.secret);

  const config = describeResource(context, COMPONENT, 'appConfig');
  const secretResource = describeResource(context, COMPONENT, 'appSecret');
  const workload = describeResource(context, COMPONENT, 'app');

  const imagePullSecrets = pullSecrets(context, COMPONENT);
  const podSpec: V1PodSpec = {
    ...(context.serviceAccountName
      ? {
          serviceAccountName: context.serviceAccountName,
          automountServiceAccountToken: context.settings.serviceAccount.automountToken,
        }
      : {}),
    ...(imagePullSecrets.length > 0 ? { imagePullSecrets } : {}),
    initContainers: [waitForDatabaseContainer(context, COMPONENT)],
    containers: [applicationContainer(context)],
  };

  return [
    configMap({ metadata: config.metadata, data: data.config }, config.placement),
    secret({ metadata: secretResource.metadata, type: 'Opaque', stringData: data.secret }, secretResource.placement),
    deployment(
      {
        metadata: workload.metadata,
        spec: {
          // The autoscaler owns the replica count when it is enabled
          ...(autoscaling.enabled ? {} : { replicas: application.replicaCount }),
          selector: { matchLabels: selectorFor(context, COMPONENT) },
          template: {
            metadata: {
              labels: podLabels(context, COMPONENT),
              annotations: {
                ...application.podAnnotations,
                'checksum/config': configHash,
                'checksum/secret': secretHash,
              },
            },
            spec: podSpec,
          },
        },
      },
      workload.placement
    ),
  ];
}

export const applicationComponent: ComponentRenderer<ChartContext> = {
  enabled: (context) => context.settings.application.enabled,
  render,
};
