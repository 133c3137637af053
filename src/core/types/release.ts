/**
 * Release identity and component types
 */

/**
 * Closed set of logical parts of a release. The renderer is total over this list.
 */
export const COMPONENTS = [
  'application',
  'database',
  'migration-task',
  'network-ingress',
  'autoscaling-policy',
  'service-identity',
] as const;

export type Component = (typeof COMPONENTS)[number];

export type DatabaseMode = 'bundled' | 'external';

/**
 * Threaded explicitly through every resolver, renderer and scheduler call.
 * Immutable for the lifetime of one install or upgrade attempt.
 */
export interface ReleaseIdentity {
  readonly name: string;
  readonly namespace: string;
  readonly revision: number;
}
