/**
 * Kubernetes RBAC Resource Factories
 */

export { type ServiceAccountPayload, serviceAccount } from './service-account.js';
