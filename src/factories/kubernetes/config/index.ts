/**
 * Kubernetes Configuration Resource Factories
 */

export { type ConfigMapPayload, configMap } from './config-map.js';
export { type SecretPayload, secret } from './secret.js';
