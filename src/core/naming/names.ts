/**
 * Deterministic resource names
 *
 * Names are a pure function of the release name and a component-local name.
 * Every name is a DNS label: at most 63 characters of lowercase alphanumerics
 * and `-`, never starting or ending with `-`.
 */

import { ConfigurationError, NamingCollisionError } from '../errors.js';
import { sha256 } from '../../utils/index.js';

export const MAX_NAME_LENGTH = 63;

/** Leaves room for the longest component suffix the chart uses */
export const MAX_RELEASE_NAME_LENGTH = 53;

export const DNS_LABEL_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

const HASH_LENGTH = 8;

// prefix + '-' + hash fills the limit exactly
const TRUNCATED_PREFIX_LENGTH = MAX_NAME_LENGTH - HASH_LENGTH - 1;

function normalizePart(part: string): string {
  return part
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * `release-component`. A name that had to be normalized or would exceed the
 * length limit gets a hash suffix instead, computed over the raw
 * `release-component` string, so distinct inputs keep distinct names after
 * normalization and truncation.
 */
export function fullName(releaseName: string, componentName: string): string {
  const parts = [normalizePart(releaseName), normalizePart(componentName)].filter(
    (part) => part.length > 0
  );
  if (parts.length === 0) {
    throw new ConfigurationError(
      `Cannot derive a resource name from release '${releaseName}' and component '${componentName}'`,
      undefined
    );
  }

  const name = parts.join('-');
  const raw = `${releaseName}-${componentName}`;
  if (name === raw && name.length <= MAX_NAME_LENGTH) {
    return name;
  }

  const prefix = name.slice(0, TRUNCATED_PREFIX_LENGTH).replace(/-+$/, '');
  return `${prefix}-${sha256(raw).slice(0, HASH_LENGTH)}`;
}

export function isDnsLabel(value: string): boolean {
  return value.length <= MAX_NAME_LENGTH && DNS_LABEL_PATTERN.test(value);
}

export function validateReleaseName(releaseName: string): void {
  if (!DNS_LABEL_PATTERN.test(releaseName) || releaseName.length > MAX_RELEASE_NAME_LENGTH) {
    throw new ConfigurationError(
      `Release name '${releaseName}' must be a lowercase DNS label of at most ${MAX_RELEASE_NAME_LENGTH} characters`,
      undefined,
      'resolve'
    );
  }
}

export function validateNamespace(namespace: string): void {
  if (!isDnsLabel(namespace)) {
    throw new ConfigurationError(
      `Namespace '${namespace}' must be a lowercase DNS label of at most ${MAX_NAME_LENGTH} characters`,
      undefined,
      'resolve'
    );
  }
}

export interface NamedResource {
  kind: string;
  name: string;
  component: string;
}

/**
 * Fail when two resources of one release would share a kind and name
 */
export function assertDistinctNames(resources: readonly NamedResource[]): void {
  const owners = new Map<string, string[]>();
  for (const resource of resources) {
    const key = `${resource.kind}/${resource.name}`;
    const existing = owners.get(key);
    if (existing) {
      throw new NamingCollisionError(key, [...existing, resource.component]);
    }
    owners.set(key, [resource.component]);
  }
}
