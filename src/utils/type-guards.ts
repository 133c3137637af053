/**
 * Type guard functions used to narrow values read from files, the command
 * line and the cluster.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/**
 * Read a property of an unknown value without asserting its type
 */
export function getProperty(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

/**
 * Follow a property path through nested objects
 */
export function getPath(value: unknown, path: readonly string[]): unknown {
  let current = value;
  for (const key of path) {
    current = getProperty(current, key);
  }
  return current;
}

export function numberAt(value: unknown, ...path: string[]): number | undefined {
  const found = getPath(value, path);
  return typeof found === 'number' ? found : undefined;
}

export function stringAt(value: unknown, ...path: string[]): string | undefined {
  const found = getPath(value, path);
  return typeof found === 'string' ? found : undefined;
}

export function arrayAt(value: unknown, ...path: string[]): unknown[] {
  const found = getPath(value, path);
  return Array.isArray(found) ? found : [];
}
