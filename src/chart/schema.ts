// Chart settings schema
// Every renderer reads its settings through the inferred ChartSettings type

import { type } from 'arktype';
import { formatSettingsValidationError } from '../core/errors.js';
import { isSettingsSequence, type SettingsTree } from '../core/settings/index.js';
import { isString } from '../utils/index.js';

const PortSchema = '1 <= number.integer <= 65535';
const PullPolicySchema = '"Always" | "IfNotPresent" | "Never"';

export const ImageSchema = type({
  repository: 'string > 0',
  tag: 'string > 0',
  pullPolicy: PullPolicySchema,
});

export const ResourceRequirementsSchema = type({
  'requests?': { '[string]': 'string' },
  'limits?': { '[string]': 'string' },
});

export const IngressPathSchema = type({
  path: 'string > 0',
  pathType: '"Prefix" | "Exact" | "ImplementationSpecific"',
});

export const IngressHostSchema = type({
  host: 'string > 0',
  paths: IngressPathSchema.array(),
});

export const IngressTlsSchema = type({
  secretName: 'string > 0',
  hosts: 'string[]',
});

// Keys every child scope may set for itself or inherit from `global`
const conventionKeys = {
  'imageRegistry?': 'string',
  'imagePullSecrets?': 'string[]',
  'storageClass?': 'string',
  'environment?': 'string',
} as const;

export const ChartSettingsSchema = type({
  global: {
    environment: 'string > 0',
    imagePullSecrets: 'string[]',
    labels: { '[string]': 'string' },
    'imageRegistry?': 'string',
    'storageClass?': 'string',
  },
  application: {
    ...conventionKeys,
    enabled: 'boolean',
    replicaCount: 'number.integer >= 0',
    image: ImageSchema,
    containerPort: PortSchema,
    env: { '[string]': 'string | number | boolean' },
    secretEnv: { '[string]': 'string | number | boolean' },
    resources: ResourceRequirementsSchema,
    probes: {
      enabled: 'boolean',
      path: 'string > 0',
      initialDelaySeconds: 'number.integer >= 0',
      periodSeconds: 'number.integer >= 1',
    },
    podAnnotations: { '[string]': 'string' },
  },
  ingress: {
    ...conventionKeys,
    enabled: 'boolean',
    className: 'string',
    annotations: { '[string]': 'string' },
    service: {
      type: '"ClusterIP" | "NodePort" | "LoadBalancer"',
      port: PortSchema,
    },
    hosts: IngressHostSchema.array(),
    tls: IngressTlsSchema.array(),
  },
  autoscaling: {
    ...conventionKeys,
    enabled: 'boolean',
    minReplicas: 'number.integer >= 1',
    maxReplicas: 'number.integer >= 1',
    targetCPUUtilizationPercentage: '1 <= number.integer <= 100',
  },
  serviceAccount: {
    ...conventionKeys,
    enabled: 'boolean',
    name: 'string',
    annotations: { '[string]': 'string' },
    automountToken: 'boolean',
  },
  migration: {
    ...conventionKeys,
    enabled: 'boolean',
    command: 'string[]',
    timeoutSeconds: 'number.integer >= 1',
    pollIntervalSeconds: 'number >= 0',
    backoffLimit: 'number.integer >= 0',
    activeDeadlineSeconds: 'number.integer >= 1',
    retention: {
      onSuccess: '"delete" | "retain"',
      onFailure: '"delete" | "retain"',
      successGraceSeconds: 'number >= 0',
    },
    resources: ResourceRequirementsSchema,
  },
  cache: {
    ...conventionKeys,
    enabled: 'boolean',
    host: 'string',
    port: PortSchema,
    db: 'number.integer >= 0',
    password: 'string',
  },
  database: {
    ...conventionKeys,
    enabled: 'boolean',
    mode: '"bundled" | "external"',
    host: 'string',
    port: PortSchema,
    name: 'string > 0',
    user: 'string > 0',
    password: 'string',
    image: ImageSchema,
    dataDir: 'string > 0',
    storage: {
      size: 'string > 0',
      accessModes: 'string[]',
    },
    resources: ResourceRequirementsSchema,
  },
});

export type ChartSettings = typeof ChartSettingsSchema.infer;
export type ImageSettings = typeof ImageSchema.infer;

/**
 * Validate a resolved settings tree against the chart schema
 */
export function readChartSettings(tree: SettingsTree): ChartSettings {
  const result = ChartSettingsSchema(tree.values);
  if (result instanceof type.errors) {
    throw formatSettingsValidationError(result, 'chart settings');
  }
  return result;
}

/**
 * Values a child scope inherits from `global` unless it sets them itself
 */
export interface ScopeConventions {
  environment: string;
  imageRegistry: string | undefined;
  imagePullSecrets: string[];
  storageClass: string | undefined;
}

export function scopeConventions(tree: SettingsTree, scope: string): ScopeConventions {
  const environment = tree.scoped(scope, 'environment');
  const imageRegistry = tree.scoped(scope, 'imageRegistry');
  const storageClass = tree.scoped(scope, 'storageClass');
  const pullSecrets = tree.scoped(scope, 'imagePullSecrets');

  return {
    environment: isString(environment) && environment ? environment : 'production',
    imageRegistry: isString(imageRegistry) && imageRegistry ? imageRegistry : undefined,
    storageClass: isString(storageClass) && storageClass ? storageClass : undefined,
    imagePullSecrets: isSettingsSequence(pullSecrets) ? pullSecrets.filter(isString) : [],
  };
}
