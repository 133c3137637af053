/**
 * Kubernetes Client Provider
 *
 * Loads a KubeConfig once and hands out the API clients the release driver
 * needs, all built from that same configuration.
 */

import * as k8s from '@kubernetes/client-node';
import { DriverError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';

export interface KubernetesClientConfig {
  /** Path of a kubeconfig file; the default loading rules apply when unset */
  kubeconfigPath?: string | undefined;
  /** Context to switch to after loading */
  context?: string | undefined;
}

export interface KubernetesClients {
  kubeConfig: k8s.KubeConfig;
  objectApi: k8s.KubernetesObjectApi;
  coreApi: k8s.CoreV1Api;
}

export class KubernetesClientProvider {
  private readonly logger = getComponentLogger('kubernetes-client-provider');
  private clients: KubernetesClients | undefined;

  constructor(private readonly config: KubernetesClientConfig = {}) {}

  getClients(): KubernetesClients {
    if (!this.clients) {
      const kubeConfig = this.loadKubeConfig();
      this.clients = {
        kubeConfig,
        objectApi: k8s.KubernetesObjectApi.makeApiClient(kubeConfig),
        coreApi: kubeConfig.makeApiClient(k8s.CoreV1Api),
      };
      this.logger.debug('Kubernetes clients initialized', {
        currentContext: kubeConfig.getCurrentContext(),
        server: kubeConfig.getCurrentCluster()?.server,
      });
    }
    return this.clients;
  }

  private loadKubeConfig(): k8s.KubeConfig {
    const kubeConfig = new k8s.KubeConfig();
    try {
      if (this.config.kubeconfigPath) {
        kubeConfig.loadFromFile(this.config.kubeconfigPath);
      } else {
        kubeConfig.loadFromDefault();
      }
      if (this.config.context) {
        kubeConfig.setCurrentContext(this.config.context);
      }
    } catch (error) {
      throw new DriverError(
        `Failed to load kubeconfig: ${error instanceof Error ? error.message : String(error)}`,
        'loadKubeConfig',
        undefined,
        error
      );
    }
    return kubeConfig;
  }
}
