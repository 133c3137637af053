/**
 * Settings Resolver
 *
 * Folds ordered settings scopes left to right into one immutable tree.
 * Mappings merge key by key, sequences and scalars are replaced, and `null`
 * removes a key. A scope that changes the shape of a path is rejected.
 */

import { ConflictError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { SettingsTree } from './tree.js';
import {
  isSettingsMapping,
  isSettingsSequence,
  joinPath,
  type SettingsMapping,
  type SettingsScope,
  type SettingsValue,
  shapeOf,
} from './types.js';

const logger = getComponentLogger('settings-resolver');

function cloneValue(value: SettingsValue): SettingsValue {
  if (isSettingsSequence(value)) {
    return value.map((item) => cloneValue(item));
  }
  if (isSettingsMapping(value)) {
    const result: Record<string, SettingsValue> = {};
    for (const [key, child] of Object.entries(value)) {
      result[key] = cloneValue(child);
    }
    return result;
  }
  return value;
}

function mergeMappings(
  base: SettingsMapping,
  overlay: SettingsMapping,
  scope: string,
  prefix: string
): SettingsMapping {
  const result: Record<string, SettingsValue> = { ...base };

  for (const [key, value] of Object.entries(overlay)) {
    const path = joinPath(prefix, key);

    if (value === null) {
      delete result[key];
      continue;
    }

    const existing = result[key];
    if (existing === undefined || existing === null) {
      result[key] = cloneValue(value);
      continue;
    }

    const existingShape = shapeOf(existing);
    const incomingShape = shapeOf(value);
    if (existingShape !== incomingShape) {
      throw new ConflictError(
        `Scope '${scope}' sets '${path}' to a ${incomingShape} but it is already defined as a ${existingShape}`,
        path,
        scope
      );
    }

    result[key] =
      isSettingsMapping(existing) && isSettingsMapping(value)
        ? mergeMappings(existing, value, scope, path)
        : cloneValue(value);
  }

  return result;
}

/**
 * Merge default scopes, then override scopes, into one settings tree.
 * Secret paths from every scope are kept secret in the result.
 */
export function resolve(
  defaultScopes: readonly SettingsScope[],
  overrideScopes: readonly SettingsScope[] = []
): SettingsTree {
  let values: SettingsMapping = {};
  const sensitivePaths = new Set<string>();

  for (const scope of [...defaultScopes, ...overrideScopes]) {
    values = mergeMappings(values, scope.values, scope.name, '');
    for (const path of scope.sensitivePaths ?? []) {
      sensitivePaths.add(path);
    }
    logger.trace('Merged settings scope', { scope: scope.name });
  }

  logger.debug('Resolved settings', {
    scopes: defaultScopes.length + overrideScopes.length,
    sensitivePaths: sensitivePaths.size,
  });

  return new SettingsTree(values, sensitivePaths);
}
