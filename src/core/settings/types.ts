/**
 * Settings tree value types
 */

export type SettingsScalar = string | number | boolean | null;

export type SettingsValue = SettingsScalar | SettingsMapping | readonly SettingsValue[];

export interface SettingsMapping {
  readonly [key: string]: SettingsValue;
}

export type SettingsShape = 'scalar' | 'mapping' | 'sequence' | 'null';

export type Sensitivity = 'secret' | 'plain';

/**
 * One layer of the configuration hierarchy
 */
export interface SettingsScope {
  /** Human-readable origin, e.g. `chart-defaults` or a values file path */
  name: string;
  values: SettingsMapping;
  /** Dotted paths whose values (and every value below them) are secret */
  sensitivePaths?: readonly string[];
}

/**
 * A single resolved value together with its sensitivity
 */
export interface ConfigValue {
  key: string;
  value: SettingsValue;
  sensitivity: Sensitivity;
}

export function isSettingsMapping(value: SettingsValue | undefined): value is SettingsMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSettingsSequence(value: SettingsValue | undefined): value is readonly SettingsValue[] {
  return Array.isArray(value);
}

export function shapeOf(value: SettingsValue): SettingsShape {
  if (value === null) return 'null';
  if (isSettingsSequence(value)) return 'sequence';
  if (isSettingsMapping(value)) return 'mapping';
  return 'scalar';
}

export function splitPath(path: string): string[] {
  return path.split('.').filter((segment) => segment.length > 0);
}

export function joinPath(prefix: string, key: string): string {
  return prefix ? `${prefix}.${key}` : key;
}
