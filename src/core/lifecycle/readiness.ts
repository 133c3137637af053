/**
 * Resource Readiness Waiting
 *
 * Polls the driver until a kind-specific evaluator reports an applied object
 * ready, backing off between attempts.
 */

import type { ReleaseDriver } from '../driver/index.js';
import { RolloutTimeoutError } from '../errors.js';
import { evaluateReadiness } from '../readiness/index.js';
import { type ResourceManifest, type ResourceStatus, toResourceRef } from '../types/index.js';
import { delay } from '../../utils/index.js';

export interface ReadinessConfig {
  timeout: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
}

export const DEFAULT_READINESS_CONFIG: ReadinessConfig = {
  timeout: 300000,
  initialDelay: 1000,
  maxDelay: 10000,
  backoffMultiplier: 1.5,
};

const IMMEDIATELY_READY_KINDS = ['ConfigMap', 'Secret', 'ServiceAccount'];

export class ResourceReadinessWaiter {
  constructor(
    private readonly driver: ReleaseDriver,
    private readonly config: ReadinessConfig = DEFAULT_READINESS_CONFIG
  ) {}

  /**
   * Current readiness of an applied manifest; a missing object is not ready
   */
  async check(manifest: ResourceManifest): Promise<ResourceStatus> {
    const live = await this.driver.read(toResourceRef(manifest));
    if (!live) {
      return { ready: false, reason: 'NotFound', message: `${manifest.kind}/${manifest.name} does not exist` };
    }
    return evaluateReadiness(live);
  }

  /**
   * Wait until the manifest is ready. Driver errors propagate; running out
   * of time raises RolloutTimeoutError with the last status message.
   */
  async waitForReady(manifest: ResourceManifest): Promise<ResourceStatus> {
    if (IMMEDIATELY_READY_KINDS.includes(manifest.kind)) {
      return { ready: true, message: `${manifest.kind} is ready when created` };
    }

    const startTime = Date.now();
    let attempt = 0;
    let status = await this.check(manifest);

    while (!status.ready) {
      const elapsed = Date.now() - startTime;
      if (elapsed >= this.config.timeout) {
        throw new RolloutTimeoutError(manifest.id, this.config.timeout, status.message);
      }
      attempt++;
      const wait = Math.min(
        this.config.initialDelay * this.config.backoffMultiplier ** (attempt - 1),
        this.config.maxDelay,
        this.config.timeout - elapsed
      );
      await delay(wait);
      status = await this.check(manifest);
    }

    return status;
  }
}
