/**
 * Render context shared by every component of the chart
 */

import { ConfigurationError } from '../core/errors.js';
import { isDnsLabel } from '../core/naming/index.js';
import type { SettingsTree } from '../core/settings/index.js';
import type { ReleaseIdentity } from '../core/types/index.js';
import { type DatabaseAddress, resolveDatabaseAddress } from '../core/wiring/index.js';
import { type ChartNames, chartNames } from './names.js';
import { type ChartSettings, readChartSettings } from './schema.js';

export interface ChartContext {
  identity: ReleaseIdentity;
  tree: SettingsTree;
  settings: ChartSettings;
  names: ChartNames;
  database: DatabaseAddress;
  /** Name of the ServiceAccount pods run as, undefined when service identity is disabled */
  serviceAccountName: string | undefined;
}

/**
 * Cross-component checks that a schema cannot express
 */
export function validateComponentGraph(settings: ChartSettings): void {
  const { application, migration, ingress, autoscaling, cache } = settings;

  if (!application.enabled) {
    const dependents: Array<[boolean, string]> = [
      [migration.enabled, 'migration.enabled'],
      [ingress.enabled, 'ingress.enabled'],
      [autoscaling.enabled, 'autoscaling.enabled'],
    ];
    for (const [enabled, path] of dependents) {
      if (enabled) {
        throw new ConfigurationError(`${path} requires application.enabled`, path);
      }
    }
  }

  if (migration.enabled && migration.command.length === 0) {
    throw new ConfigurationError('Migration is enabled but migration.command is empty', 'migration.command');
  }

  if (autoscaling.enabled && autoscaling.minReplicas > autoscaling.maxReplicas) {
    throw new ConfigurationError(
      `autoscaling.minReplicas (${autoscaling.minReplicas}) exceeds autoscaling.maxReplicas (${autoscaling.maxReplicas})`,
      'autoscaling.minReplicas'
    );
  }

  if (ingress.enabled && ingress.hosts.length === 0) {
    throw new ConfigurationError('Ingress is enabled but no hosts are configured', 'ingress.hosts');
  }

  if (cache.enabled && cache.host.length === 0) {
    throw new ConfigurationError('Cache is enabled but cache.host is empty', 'cache.host');
  }

  if (settings.serviceAccount.name && !isDnsLabel(settings.serviceAccount.name)) {
    throw new ConfigurationError(
      `serviceAccount.name '${settings.serviceAccount.name}' is not a valid DNS label`,
      'serviceAccount.name'
    );
  }
}

export function createChartContext(tree: SettingsTree, identity: ReleaseIdentity): ChartContext {
  const settings = readChartSettings(tree);
  validateComponentGraph(settings);
  const names = chartNames(identity.name);

  return {
    identity,
    tree,
    settings,
    names,
    database: resolveDatabaseAddress(tree, identity),
    serviceAccountName: settings.serviceAccount.enabled
      ? settings.serviceAccount.name || names.app
      : undefined,
  };
}
