/**
 * Resource Renderer
 *
 * Pure function of a resolved settings tree and a release identity. Either
 * every manifest is produced or an error is thrown; there is no partial
 * output.
 */

import { getComponentLogger } from '../logging/index.js';
import { assertDistinctNames, validateNamespace, validateReleaseName } from '../naming/index.js';
import type { SettingsTree } from '../settings/index.js';
import { COMPONENTS, type Component, type ReleaseIdentity, type ResourceManifest } from '../types/index.js';
import { checksumOf, deepFreeze } from '../../utils/index.js';
import type { ChartDefinition, RenderedRelease } from './types.js';

const logger = getComponentLogger('renderer');

export function renderChart<TContext>(
  chart: ChartDefinition<TContext>,
  settings: SettingsTree,
  identity: ReleaseIdentity
): RenderedRelease {
  validateReleaseName(identity.name);
  validateNamespace(identity.namespace);

  const context = chart.createContext(settings, identity);
  const components: Component[] = [];
  const manifests: ResourceManifest[] = [];

  for (const component of COMPONENTS) {
    const renderer = chart.components[component];
    if (!renderer.enabled(context)) {
      continue;
    }
    components.push(component);
    manifests.push(...renderer.render(context));
  }

  assertDistinctNames(
    manifests.map((manifest) => ({
      kind: manifest.kind,
      name: manifest.name,
      component: manifest.ownerComponent,
    }))
  );

  const hook = manifests.find((manifest) => manifest.hookPhase !== 'none');

  logger.debug('Rendered release', {
    release: identity.name,
    revision: identity.revision,
    components,
    manifests: manifests.length,
  });

  return deepFreeze({
    identity: { ...identity },
    chart: { name: chart.name, version: chart.version },
    components,
    manifests,
    settingsChecksum: checksumOf(settings.values),
    migrationChecksum: hook?.checksum,
  });
}
