/**
 * Kubernetes Networking Resource Factories
 */

export { type IngressPayload, ingress } from './ingress.js';
export { type ServicePayload, service, serviceReadiness } from './service.js';
