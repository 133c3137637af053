/**
 * Database component: bundled PostgreSQL. Renders nothing in external mode,
 * where the database is a reference only.
 */

import type { ComponentRenderer } from '../../core/rendering/index.js';
import type { ResourceManifest } from '../../core/types/index.js';
import { configMap, secret, service, statefulSet } from '../../factories/index.js';
import { checksumOf } from '../../utils/index.js';
import type { ChartContext } from '../context.js';
import { describeResource, imageReference, podLabels, pullSecrets, selectorFor } from '../metadata.js';
import { scopeConventions } from '../schema.js';

const COMPONENT = 'database';

const DATA_VOLUME = 'data';
const DATA_MOUNT_PATH = '/var/lib/postgresql/data';

function render(context: ChartContext): ResourceManifest[] {
  const { database } = context.settings;
  const conventions = scopeConventions(context.tree, 'database');
  const selector = selectorFor(context, COMPONENT);

  const configData = {
    POSTGRES_DB: database.name,
    PGDATA: database.dataDir,
    PGPORT: String(database.port),
  };
  const secretData = {
    POSTGRES_USER: database.user,
    POSTGRES_PASSWORD: database.password,
  };
  const configHash = checksumOf(configData);
  const secretHash = checksumOf(secretData);

  const config = describeResource(context, COMPONENT, 'postgresConfig');
  const credentials = describeResource(context, COMPONENT, 'postgresSecret');
  const headless = describeResource(context, COMPONENT, 'postgresHeadless');
  const workload = describeResource(context, COMPONENT, 'postgres');

  const imagePullSecrets = pullSecrets(context, COMPONENT);

  return [
    configMap({ metadata: config.metadata, data: configData }, config.placement),
    secret(
      { metadata: credentials.metadata, type: 'Opaque', stringData: secretData },
      credentials.placement
    ),
    // Headless: the stable network identity the application addresses
    service(
      {
        metadata: headless.metadata,
        spec: {
          clusterIP: 'None',
          selector,
          ports: [{ name: 'postgres', port: database.port, targetPort: 'postgres', protocol: 'TCP' }],
        },
      },
      headless.placement
    ),
    statefulSet(
      {
        metadata: workload.metadata,
        spec: {
          serviceName: context.names.postgresHeadless,
          replicas: 1,
          selector: { matchLabels: selector },
          template: {
            metadata: {
              labels: podLabels(context, COMPONENT),
              annotations: { 'checksum/config': configHash, 'checksum/secret': secretHash },
            },
            spec: {
              ...(imagePullSecrets.length > 0 ? { imagePullSecrets } : {}),
              containers: [
                {
                  name: 'postgres',
                  image: imageReference(database.image, conventions.imageRegistry),
                  imagePullPolicy: database.image.pullPolicy,
                  ports: [{ name: 'postgres', containerPort: database.port, protocol: 'TCP' }],
                  envFrom: [
                    { configMapRef: { name: context.names.postgresConfig } },
                    { secretRef: { name: context.names.postgresSecret } },
                  ],
                  readinessProbe: {
                    exec: { command: ['sh', '-c', 'pg_isready -U "$POSTGRES_USER" -d "$POSTGRES_DB"'] },
                    initialDelaySeconds: 5,
                    periodSeconds: 10,
                  },
                  resources: database.resources,
                  volumeMounts: [{ name: DATA_VOLUME, mountPath: DATA_MOUNT_PATH }],
                },
              ],
            },
          },
          volumeClaimTemplates: [
            {
              metadata: { name: DATA_VOLUME, labels: selector },
              spec: {
                accessModes: database.storage.accessModes,
                ...(conventions.storageClass ? { storageClassName: conventions.storageClass } : {}),
                resources: { requests: { storage: database.storage.size } },
              },
            },
          ],
        },
      },
      workload.placement
    ),
  ];
}

export const databaseComponent: ComponentRenderer<ChartContext> = {
  enabled: (context) => context.database.mode === 'bundled',
  render,
};
