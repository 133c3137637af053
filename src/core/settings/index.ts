export { resolve } from './resolver.js';
export { parseSetExpressions, type SetParseOptions } from './set-parser.js';
export { REDACTED, SettingsTree } from './tree.js';
export {
  type ConfigValue,
  isSettingsMapping,
  isSettingsSequence,
  joinPath,
  type Sensitivity,
  type SettingsMapping,
  type SettingsScalar,
  type SettingsScope,
  type SettingsShape,
  type SettingsValue,
  shapeOf,
  splitPath,
} from './types.js';
export { loadValuesFile, parseValuesDocument, toSettingsMapping } from './values-file.js';
