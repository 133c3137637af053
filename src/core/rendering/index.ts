export { renderChart } from './renderer.js';
export type { ChartDefinition, ComponentRenderer, RenderedRelease } from './types.js';
