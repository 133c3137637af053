import type { ComponentRenderer } from '../../core/rendering/index.js';
import type { Component } from '../../core/types/index.js';
import type { ChartContext } from '../context.js';
import { applicationComponent } from './application.js';
import { autoscalingComponent } from './autoscaling.js';
import { databaseComponent } from './database.js';
import { migrationComponent } from './migration.js';
import { networkIngressComponent } from './network-ingress.js';
import { serviceIdentityComponent } from './service-identity.js';

export const CHART_COMPONENTS: { readonly [C in Component]: ComponentRenderer<ChartContext> } = {
  application: applicationComponent,
  database: databaseComponent,
  'migration-task': migrationComponent,
  'network-ingress': networkIngressComponent,
  'autoscaling-policy': autoscalingComponent,
  'service-identity': serviceIdentityComponent,
};

export { applicationData } from './application.js';
export { databaseEnv, databaseUrl } from './database-client.js';
export { migrationHookPhase } from './migration.js';
