/**
 * Release Teardown
 *
 * Deletes the resources of a release in reverse apply order. A failure on
 * one resource is recorded and the rest are still deleted.
 */

import type { ReleaseDriver } from '../driver/index.js';
import { toError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type { ProgressCallback, ResourceRef, TeardownError, TeardownResult } from '../types/index.js';

export interface TeardownConfig {
  releaseName: string;
  revision: number;
  progressCallback?: ProgressCallback | undefined;
}

function resourceIdentifier(ref: ResourceRef): string {
  return `${ref.kind}/${ref.name}`;
}

export class ReleaseTeardown {
  private readonly logger = getComponentLogger('teardown');

  constructor(private readonly driver: ReleaseDriver) {}

  async teardown(resources: readonly ResourceRef[], config: TeardownConfig): Promise<TeardownResult> {
    const startTime = Date.now();
    const deletedResources: string[] = [];
    const errors: TeardownError[] = [];
    const emit = config.progressCallback;

    for (const ref of [...resources].reverse()) {
      const resourceId = resourceIdentifier(ref);
      try {
        const deleted = await this.driver.delete(ref);
        deletedResources.push(resourceId);
        emit?.({
          type: 'resource-deleted',
          revision: config.revision,
          resourceId,
          message: deleted ? `Deleted ${resourceId}` : `${resourceId} was already gone`,
          timestamp: new Date(),
        });
      } catch (error) {
        const cause = toError(error);
        errors.push({ resourceId, error: cause, timestamp: new Date() });
        emit?.({
          type: 'failed',
          revision: config.revision,
          resourceId,
          message: `Failed to delete ${resourceId}: ${cause.message}`,
          timestamp: new Date(),
          error: cause,
        });
        this.logger.warn('Teardown error', { resourceId, error: cause.message });
      }
    }

    const status = errors.length === 0 ? 'success' : deletedResources.length > 0 ? 'partial' : 'failed';

    emit?.({
      type: 'completed',
      revision: config.revision,
      message: `Teardown completed: ${deletedResources.length} deleted, ${errors.length} failed`,
      timestamp: new Date(),
    });

    return {
      releaseName: config.releaseName,
      deletedResources,
      duration: Date.now() - startTime,
      status,
      errors,
    };
  }
}
