/**
 * Resource names and selector labels of the cat API chart
 */

import { fullName, type SelectorLabels, selectorLabels } from '../core/naming/index.js';
import type { Component } from '../core/types/index.js';
import { DATABASE_SERVICE_NAME } from '../core/wiring/index.js';

/**
 * Component-local names; the release name is prepended by `fullName`
 */
export const LOCAL_NAMES = {
  appConfig: 'app-config',
  appSecret: 'app-secret',
  app: 'app',
  postgresConfig: 'postgres-config',
  postgresSecret: 'postgres-secret',
  postgresHeadless: DATABASE_SERVICE_NAME,
  postgres: 'postgres',
  migration: 'migration',
} as const;

export type LocalName = keyof typeof LOCAL_NAMES;

export type ChartNames = { readonly [K in LocalName]: string };

export function chartNames(releaseName: string): ChartNames {
  return {
    appConfig: fullName(releaseName, LOCAL_NAMES.appConfig),
    appSecret: fullName(releaseName, LOCAL_NAMES.appSecret),
    app: fullName(releaseName, LOCAL_NAMES.app),
    postgresConfig: fullName(releaseName, LOCAL_NAMES.postgresConfig),
    postgresSecret: fullName(releaseName, LOCAL_NAMES.postgresSecret),
    postgresHeadless: fullName(releaseName, LOCAL_NAMES.postgresHeadless),
    postgres: fullName(releaseName, LOCAL_NAMES.postgres),
    migration: fullName(releaseName, LOCAL_NAMES.migration),
  };
}

/**
 * Value of the `app` selector label per component. Each workload gets its
 * own value so no two workloads select each other's pods.
 */
export const COMPONENT_LABELS: Readonly<Record<Component, string>> = {
  application: 'cat-api',
  database: 'postgres',
  'migration-task': 'cat-api-migration',
  'network-ingress': 'cat-api-ingress',
  'autoscaling-policy': 'cat-api-autoscaler',
  'service-identity': 'cat-api-identity',
};

/**
 * Settings scope each component reads its convention keys from
 */
export const COMPONENT_SCOPES: Readonly<Record<Component, string>> = {
  application: 'application',
  database: 'database',
  'migration-task': 'migration',
  'network-ingress': 'ingress',
  'autoscaling-policy': 'autoscaling',
  'service-identity': 'serviceAccount',
};

export function componentSelector(releaseName: string, component: Component): SelectorLabels {
  return selectorLabels(releaseName, COMPONENT_LABELS[component]);
}
