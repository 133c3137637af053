/**
 * Kubernetes resource factories
 */

export * from './autoscaling/index.js';
export * from './config/index.js';
export * from './networking/index.js';
export * from './rbac/index.js';
export * from './workloads/index.js';
