export {
  type KubernetesClientConfig,
  KubernetesClientProvider,
  type KubernetesClients,
} from './client-provider.js';
export {
  formatKubernetesError,
  getErrorReason,
  getErrorStatusCode,
  isConflictError,
  isNotFoundError,
  toDriverError,
} from './errors.js';
export {
  type CoreApiClient,
  KubernetesReleaseDriver,
  type KubernetesReleaseDriverOptions,
  type ObjectApiClient,
} from './release-driver.js';
