/**
 * Parser for command-line `--set` overrides.
 *
 *   --set application.replicaCount=3,ingress.enabled=true
 *   --set ingress.annotations.nginx\.ingress\.kubernetes\.io/ssl-redirect=false
 *   --set migration.command={alembic,upgrade,head}
 */

import { ConfigurationError, ConflictError } from '../errors.js';
import { joinPath, type SettingsScalar, type SettingsScope, type SettingsValue, shapeOf } from './types.js';

export interface SetParseOptions {
  scopeName?: string;
  /** Mark every assigned path secret (used by `--set-secret`) */
  sensitive?: boolean;
  /** Convert `true`, `false`, `null` and integers; when false every value is a string */
  typed?: boolean;
}

const INTEGER_PATTERN = /^-?(0|[1-9]\d*)$/;

function parseScalar(raw: string, typed: boolean): SettingsScalar {
  if (!typed) return raw;
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw === 'null') return null;
  if (INTEGER_PATTERN.test(raw)) {
    const parsed = Number(raw);
    if (Number.isSafeInteger(parsed)) return parsed;
  }
  return raw;
}

/**
 * Split on a separator that is neither escaped nor inside `{...}`
 */
function splitUnescaped(input: string, separator: string): string[] {
  const parts: string[] = [];
  let current = '';
  let depth = 0;

  for (let i = 0; i < input.length; i++) {
    const char = input.charAt(i);
    if (char === '\\' && i + 1 < input.length) {
      current += char + input.charAt(i + 1);
      i++;
      continue;
    }
    if (char === '{') depth++;
    if (char === '}') depth = Math.max(0, depth - 1);
    if (char === separator && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  parts.push(current);
  return parts;
}

function unescape(input: string): string {
  return input.replace(/\\(.)/g, '$1');
}

function parseValue(raw: string, typed: boolean): SettingsValue {
  if (raw.startsWith('{') && raw.endsWith('}')) {
    const inner = raw.slice(1, -1);
    if (inner.trim() === '') return [];
    return splitUnescaped(inner, ',').map((item) => parseScalar(unescape(item), typed));
  }
  return parseScalar(unescape(raw), typed);
}

function parseKey(rawKey: string, expression: string): string[] {
  if (rawKey.includes('[')) {
    throw new ConfigurationError(
      `List index syntax is not supported in --set expression '${expression}'`,
      unescape(rawKey),
      'resolve'
    );
  }
  const segments = splitUnescaped(rawKey, '.').map(unescape);
  if (segments.length === 0 || segments.some((segment) => segment.length === 0)) {
    throw new ConfigurationError(`Invalid key in --set expression '${expression}'`, rawKey, 'resolve');
  }
  return segments;
}

/**
 * Parse `--set` expressions into one override scope
 */
export function parseSetExpressions(
  expressions: readonly string[],
  options: SetParseOptions = {}
): SettingsScope {
  const scopeName = options.scopeName ?? (options.sensitive ? 'set-secret' : 'set');
  const typed = options.typed ?? !options.sensitive;
  const root: Record<string, SettingsValue> = {};
  // Mutable handles for the mappings created while parsing
  const nodes = new Map<string, Record<string, SettingsValue>>([['', root]]);
  const assignedPaths: string[] = [];

  const assign = (segments: string[], value: SettingsValue): void => {
    let node = root;
    let path = '';

    for (const segment of segments.slice(0, -1)) {
      path = joinPath(path, segment);
      const existing = node[segment];
      const child = nodes.get(path);
      if (child) {
        node = child;
        continue;
      }
      if (existing !== undefined && existing !== null) {
        throw new ConflictError(
          `'${path}' is set both as a ${shapeOf(existing)} and as a mapping`,
          path,
          scopeName
        );
      }
      const created: Record<string, SettingsValue> = {};
      node[segment] = created;
      nodes.set(path, created);
      node = created;
    }

    const last = segments[segments.length - 1] ?? '';
    const leafPath = joinPath(path, last);
    const existing = node[last];
    if (existing !== undefined && existing !== null && value !== null) {
      const existingShape = nodes.has(leafPath) ? 'mapping' : shapeOf(existing);
      const incomingShape = shapeOf(value);
      if (existingShape !== incomingShape) {
        throw new ConflictError(
          `'${leafPath}' is set both as a ${existingShape} and as a ${incomingShape}`,
          leafPath,
          scopeName
        );
      }
    }
    // A leaf write replaces any mapping that was built at or below this path
    for (const key of [...nodes.keys()]) {
      if (key === leafPath || key.startsWith(`${leafPath}.`)) {
        nodes.delete(key);
      }
    }
    node[last] = value;
    assignedPaths.push(leafPath);
  };

  for (const expression of expressions) {
    for (const assignment of splitUnescaped(expression, ',')) {
      if (assignment.trim() === '') continue;
      const [rawKey, ...rest] = splitUnescaped(assignment, '=');
      if (rawKey === undefined || rest.length === 0) {
        throw new ConfigurationError(
          `Expected key=value in --set expression '${expression}'`,
          undefined,
          'resolve'
        );
      }
      assign(parseKey(rawKey.trim(), expression), parseValue(rest.join('='), typed));
    }
  }

  return {
    name: scopeName,
    values: root,
    ...(options.sensitive ? { sensitivePaths: assignedPaths } : {}),
  };
}
