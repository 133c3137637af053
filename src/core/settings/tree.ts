import { deepFreeze } from '../../utils/index.js';
import {
  type ConfigValue,
  isSettingsMapping,
  isSettingsSequence,
  joinPath,
  type SettingsMapping,
  type SettingsValue,
  splitPath,
} from './types.js';

export const REDACTED = '<redacted>';

/**
 * Immutable, resolved settings. Built once per operation by the resolver.
 */
export class SettingsTree {
  readonly values: SettingsMapping;
  private readonly sensitive: ReadonlySet<string>;

  constructor(values: SettingsMapping, sensitivePaths: Iterable<string> = []) {
    this.values = deepFreeze(values);
    this.sensitive = new Set(sensitivePaths);
  }

  get(path: string): SettingsValue | undefined {
    let current: SettingsValue | undefined = this.values;
    for (const segment of splitPath(path)) {
      if (!isSettingsMapping(current)) {
        return undefined;
      }
      current = current[segment];
    }
    return current;
  }

  has(path: string): boolean {
    return this.get(path) !== undefined;
  }

  /**
   * Look up a convention key for a child scope, inheriting from `global`
   * when the scope leaves it unset
   */
  scoped(scope: string, key: string): SettingsValue | undefined {
    const own = this.get(joinPath(scope, key));
    if (own !== undefined && own !== null) {
      return own;
    }
    return this.get(joinPath('global', key));
  }

  /**
   * A path is secret when it, or any ancestor, was declared secret by a scope
   */
  isSensitive(path: string): boolean {
    const segments = splitPath(path);
    for (let i = 1; i <= segments.length; i++) {
      if (this.sensitive.has(segments.slice(0, i).join('.'))) {
        return true;
      }
    }
    return false;
  }

  sensitivePaths(): string[] {
    return [...this.sensitive].sort();
  }

  configValue(path: string): ConfigValue | undefined {
    const value = this.get(path);
    if (value === undefined) {
      return undefined;
    }
    return { key: path, value, sensitivity: this.isSensitive(path) ? 'secret' : 'plain' };
  }

  /**
   * Copy of the values with every secret leaf replaced
   */
  redacted(): SettingsMapping {
    return this.redactMapping(this.values, '');
  }

  toJSON(): SettingsMapping {
    return this.values;
  }

  private redactMapping(mapping: SettingsMapping, prefix: string): SettingsMapping {
    const result: Record<string, SettingsValue> = {};
    for (const [key, value] of Object.entries(mapping)) {
      result[key] = this.redactValue(value, joinPath(prefix, key));
    }
    return result;
  }

  private redactValue(value: SettingsValue, path: string): SettingsValue {
    if (isSettingsMapping(value)) {
      return this.redactMapping(value, path);
    }
    if (this.isSensitive(path)) {
      return isSettingsSequence(value) ? value.map(() => REDACTED) : REDACTED;
    }
    return value;
  }
}
