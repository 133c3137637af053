/**
 * General utility functions
 *
 * String manipulation, deterministic ID generation, hashing and freezing
 * helpers used across the engine.
 */

import { createHash } from 'node:crypto';
import { isRecord } from './type-guards.js';

/**
 * Generate deterministic resource ID based on kind and a stable name.
 * IDs do not include the release name so the same logical resource keeps its
 * ID across releases and revisions.
 */
export function generateDeterministicResourceId(kind: string, name: string): string {
  const cleanKind = kind.toLowerCase().replace(/[^a-zA-Z0-9]/g, '');

  if (name.includes('${') || name.includes('{{')) {
    throw new Error(
      `Cannot generate deterministic resource ID for ${kind} with template expression in name: "${name}"`
    );
  }

  if (name.toLowerCase().includes(cleanKind)) {
    return toCamelCase(name);
  }

  return toCamelCase(`${cleanKind}-${name}`);
}

/**
 * Converts a kebab-case or snake_case string to camelCase
 */
export function toCamelCase(str: string): string {
  if (!str) {
    return '';
  }

  return str
    .split(/[-_]/)
    .map((word, index) => {
      if (index === 0) {
        return word.charAt(0).toLowerCase() + word.slice(1);
      }
      return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
    })
    .join('');
}

/**
 * JSON with object keys sorted at every level, so equal values always hash equally
 */
export function canonicalJson(value: unknown): string {
  if (value === undefined) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }
  if (isRecord(value)) {
    const entries = Object.keys(value)
      .sort()
      .filter((key) => value[key] !== undefined)
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * SHA-256 of the canonical JSON form of a value
 */
export function checksumOf(value: unknown): string {
  return sha256(canonicalJson(value));
}

/**
 * Recursively freeze a value. Manifests and settings trees are handed between
 * components by reference and must never be edited in place.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.getOwnPropertyNames(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function encodeBase64(value: string): string {
  return Buffer.from(value, 'utf8').toString('base64');
}

export function decodeBase64(value: string): string {
  return Buffer.from(value, 'base64').toString('utf8');
}
