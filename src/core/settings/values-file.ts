/**
 * Values file loading
 */

import { readFileSync } from 'node:fs';
import * as yaml from 'js-yaml';
import { ConfigurationError } from '../errors.js';
import { isRecord } from '../../utils/index.js';
import { joinPath, type SettingsMapping, type SettingsScope, type SettingsValue } from './types.js';

function toSettingsValue(value: unknown, path: string, source: string): SettingsValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`${source}: '${path}' is not a finite number`, path, 'resolve');
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toSettingsValue(item, `${path}.${index}`, source));
  }
  if (isRecord(value)) {
    return toSettingsMapping(value, source, path);
  }
  throw new ConfigurationError(`${source}: unsupported value at '${path}'`, path, 'resolve');
}

/**
 * Convert parsed YAML or JSON into a settings mapping
 */
export function toSettingsMapping(value: unknown, source: string, prefix = ''): SettingsMapping {
  if (value === null || value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(
      `${source}: expected a mapping${prefix ? ` at '${prefix}'` : ' at the top level'}`,
      prefix || undefined,
      'resolve'
    );
  }
  const result: Record<string, SettingsValue> = {};
  for (const [key, child] of Object.entries(value)) {
    const path = joinPath(prefix, key);
    result[key] = toSettingsValue(child, path, source);
  }
  return result;
}

/**
 * Parse a YAML document into a settings scope named after its source
 */
export function parseValuesDocument(content: string, source: string): SettingsScope {
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { schema: yaml.CORE_SCHEMA, filename: source });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to parse values file ${source}: ${reason}`, undefined, 'resolve');
  }
  return { name: source, values: toSettingsMapping(parsed, source) };
}

export function loadValuesFile(filePath: string): SettingsScope {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read values file ${filePath}: ${reason}`, undefined, 'resolve');
  }
  return parseValuesDocument(content, filePath);
}
