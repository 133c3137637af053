/**
 * Default settings scopes for the cat API chart and its bundled PostgreSQL
 * subchart. These are the first scopes of every resolution; values files and
 * command-line overrides are folded on top of them.
 */

import type { SettingsMapping, SettingsScope } from '../core/settings/index.js';

export const DEFAULT_NAMESPACE = 'cat-api-ns';
export const DEFAULT_RELEASE_NAME = 'cat-api-release';

export const CHART_NAME = 'cat-api';
export const CHART_VERSION = '0.1.0';

const chartValues: SettingsMapping = {
  global: {
    environment: 'production',
    imagePullSecrets: [],
    labels: {},
  },
  application: {
    enabled: true,
    replicaCount: 2,
    image: {
      repository: 'cat-api',
      tag: '1.0.0',
      pullPolicy: 'IfNotPresent',
    },
    containerPort: 8000,
    env: {
      LOG_LEVEL: 'info',
    },
    secretEnv: {},
    resources: {
      requests: { cpu: '100m', memory: '128Mi' },
      limits: { cpu: '500m', memory: '512Mi' },
    },
    probes: {
      enabled: true,
      path: '/',
      initialDelaySeconds: 10,
      periodSeconds: 10,
    },
    podAnnotations: {},
  },
  ingress: {
    enabled: false,
    className: 'nginx',
    annotations: {},
    service: {
      type: 'ClusterIP',
      port: 80,
    },
    hosts: [
      {
        host: 'cat-api.local',
        paths: [{ path: '/', pathType: 'Prefix' }],
      },
    ],
    tls: [],
  },
  autoscaling: {
    enabled: false,
    minReplicas: 2,
    maxReplicas: 5,
    targetCPUUtilizationPercentage: 80,
  },
  serviceAccount: {
    enabled: false,
    name: '',
    annotations: {},
    automountToken: false,
  },
  migration: {
    enabled: true,
    command: ['alembic', 'upgrade', 'head'],
    timeoutSeconds: 300,
    pollIntervalSeconds: 2,
    backoffLimit: 0,
    activeDeadlineSeconds: 600,
    retention: {
      onSuccess: 'delete',
      onFailure: 'retain',
      successGraceSeconds: 10,
    },
    resources: {},
  },
  cache: {
    enabled: false,
    host: 'redis-master.redis.svc.cluster.local',
    port: 6379,
    db: 0,
    password: '',
  },
};

const databaseValues: SettingsMapping = {
  database: {
    enabled: true,
    mode: 'bundled',
    host: '',
    port: 5432,
    name: 'cats',
    user: 'postgres',
    password: 'postgres',
    image: {
      repository: 'postgres',
      tag: '16-alpine',
      pullPolicy: 'IfNotPresent',
    },
    dataDir: '/var/lib/postgresql/data/pgdata',
    storage: {
      size: '1Gi',
      accessModes: ['ReadWriteOnce'],
    },
    resources: {
      requests: { cpu: '100m', memory: '256Mi' },
      limits: { cpu: '500m', memory: '512Mi' },
    },
  },
};

export const DEFAULT_DATABASE_PASSWORD = 'postgres';

export const CHART_DEFAULTS: SettingsScope = {
  name: 'chart-defaults',
  values: chartValues,
  sensitivePaths: ['application.secretEnv', 'cache.password'],
};

export const DATABASE_DEFAULTS: SettingsScope = {
  name: 'database-defaults',
  values: databaseValues,
  sensitivePaths: ['database.user', 'database.password'],
};

/**
 * Default scopes in precedence order, lowest first
 */
export const DEFAULT_SCOPES: readonly SettingsScope[] = [CHART_DEFAULTS, DATABASE_DEFAULTS];
