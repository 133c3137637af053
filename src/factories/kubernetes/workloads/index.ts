/**
 * Kubernetes Workload Resource Factories
 */

export { type DeploymentPayload, deployment, deploymentReadiness } from './deployment.js';
export { type JobPayload, job, jobPhase, jobReadiness } from './job.js';
export { type StatefulSetPayload, statefulSet, statefulSetReadiness } from './stateful-set.js';
