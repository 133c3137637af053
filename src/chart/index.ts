/**
 * The cat API chart: the application, its PostgreSQL database and the
 * schema migration that runs before each rollout.
 */

import { type ChartDefinition, type RenderedRelease, renderChart } from '../core/rendering/index.js';
import type { SettingsTree } from '../core/settings/index.js';
import type { ReleaseIdentity } from '../core/types/index.js';
import { CHART_COMPONENTS } from './components/index.js';
import { type ChartContext, createChartContext } from './context.js';
import { CHART_NAME, CHART_VERSION, DEFAULT_SCOPES } from './defaults.js';

export const catApiChart: ChartDefinition<ChartContext> = {
  name: CHART_NAME,
  version: CHART_VERSION,
  defaultScopes: DEFAULT_SCOPES,
  createContext: createChartContext,
  components: CHART_COMPONENTS,
};

/**
 * Render the cat API chart for one release revision
 */
export function render(settings: SettingsTree, identity: ReleaseIdentity): RenderedRelease {
  return renderChart(catApiChart, settings, identity);
}

export { applicationData, databaseEnv, databaseUrl, migrationHookPhase } from './components/index.js';
export { type ChartContext, createChartContext, validateComponentGraph } from './context.js';
export {
  CHART_DEFAULTS,
  CHART_NAME,
  CHART_VERSION,
  DATABASE_DEFAULTS,
  DEFAULT_DATABASE_PASSWORD,
  DEFAULT_NAMESPACE,
  DEFAULT_RELEASE_NAME,
  DEFAULT_SCOPES,
} from './defaults.js';
export { type ChartNames, chartNames, COMPONENT_LABELS, componentSelector, LOCAL_NAMES } from './names.js';
export { type ChartSettings, ChartSettingsSchema, readChartSettings, scopeConventions } from './schema.js';
