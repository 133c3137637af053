/**
 * Migration task component: the one-shot schema upgrade Job that runs as a
 * pre-install or pre-upgrade hook.
 */

import type { ComponentRenderer } from '../../core/rendering/index.js';
import type { HookPhase, ResourceManifest } from '../../core/types/index.js';
import { job } from '../../factories/index.js';
import { checksumOf } from '../../utils/index.js';
import type { ChartContext } from '../context.js';
import { describeResource, imageReference, podLabels, pullSecrets } from '../metadata.js';
import { scopeConventions } from '../schema.js';
import { applicationData } from './application.js';
import { databaseEnv, waitForDatabaseContainer } from './database-client.js';

const COMPONENT = 'migration-task';

export function migrationHookPhase(revision: number): HookPhase {
  return revision <= 1 ? 'pre-install' : 'pre-upgrade';
}

function render(context: ChartContext): ResourceManifest[] {
  const { migration, application } = context.settings;
  const registry = scopeConventions(context.tree, 'migration').imageRegistry;
  const task = describeResource(context, COMPONENT, 'migration', {
    hookPhase: migrationHookPhase(context.identity.revision),
  });
  const imagePullSecrets = pullSecrets(context, COMPONENT);

  return [
    job(
      {
        metadata: task.metadata,
        spec: {
          backoffLimit: migration.backoffLimit,
          activeDeadlineSeconds: migration.activeDeadlineSeconds,
          template: {
            metadata: {
              labels: podLabels(context, COMPONENT),
              // Part of the Job's checksum, which is the migration skip key
              annotations: { 'checksum/secret': checksumOf(applicationData(context).secret) },
            },
            spec: {
              restartPolicy: 'Never',
              ...(context.serviceAccountName ? { serviceAccountName: context.serviceAccountName } : {}),
              ...(imagePullSecrets.length > 0 ? { imagePullSecrets } : {}),
              initContainers: [waitForDatabaseContainer(context, COMPONENT)],
              containers: [
                {
                  name: 'migration',
                  image: imageReference(application.image, registry),
                  imagePullPolicy: application.image.pullPolicy,
                  command: [...migration.command],
                  env: databaseEnv(context),
                  envFrom: [{ secretRef: { name: context.names.appSecret } }],
                  resources: migration.resources,
                },
              ],
            },
          },
        },
      },
      task.placement
    ),
  ];
}

export const migrationComponent: ComponentRenderer<ChartContext> = {
  enabled: (context) => context.settings.migration.enabled && context.settings.application.enabled,
  render,
};
