/**
 * chartwright - release composition and lifecycle engine for the cat API chart.
 */

// =============================================================================
// CHART
// =============================================================================
export * from './chart/index.js';

// =============================================================================
// CORE FUNCTIONALITY
// =============================================================================
export * from './core/driver/index.js';
export * from './core/errors.js';
export * from './core/lifecycle/index.js';
export * from './core/logging/index.js';
export * from './core/naming/index.js';
export * from './core/readiness/index.js';
export * from './core/rendering/index.js';
export * from './core/serialization/index.js';
export * from './core/settings/index.js';
export * from './core/types/index.js';
export * from './core/wiring/index.js';

// Kubernetes-backed driver
export {
  formatKubernetesError,
  getErrorStatusCode,
  isConflictError,
  isNotFoundError,
  type KubernetesClientConfig,
  KubernetesClientProvider,
  type KubernetesClients,
  KubernetesReleaseDriver,
  type KubernetesReleaseDriverOptions,
} from './core/kubernetes/index.js';

// =============================================================================
// FACTORIES
// =============================================================================
export * from './factories/index.js';

// =============================================================================
// OPERATIONS
// =============================================================================
export * from './operations/index.js';

// =============================================================================
// UTILITIES
// =============================================================================
export * from './utils/index.js';
