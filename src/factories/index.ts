/**
 * Factory Functions Index
 *
 * Kubernetes resource factories and the shared manifest builder.
 */

// =============================================================================
// KUBERNETES ECOSYSTEM
// =============================================================================
export * from './kubernetes/index.js';

// =============================================================================
// SHARED UTILITIES
// =============================================================================
export { contentChecksum, createResource, type Payload, type ResourceInput } from './shared.js';
