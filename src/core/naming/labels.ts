/**
 * Labels and annotations
 *
 * Selector labels are immutable once a workload exists, so they only ever
 * hold the component and release names. Revision, checksums and other
 * changing values go into annotations.
 */

import type { HookPhase } from '../types/index.js';

export const MANAGED_BY = 'chartwright';

export const ANNOTATION_PREFIX = 'chartwright.io';

export const ANNOTATIONS = {
  revision: `${ANNOTATION_PREFIX}/revision`,
  component: `${ANNOTATION_PREFIX}/component`,
  settingsChecksum: `${ANNOTATION_PREFIX}/settings-checksum`,
  hook: `${ANNOTATION_PREFIX}/hook`,
} as const;

export const LABELS = {
  managedBy: 'app.kubernetes.io/managed-by',
  environment: 'environment',
} as const;

export type SelectorLabels = {
  readonly app: string;
  readonly instance: string;
};

export function selectorLabels(releaseName: string, componentName: string): SelectorLabels {
  return { app: componentName, instance: releaseName };
}

export interface ManifestLabelOptions {
  environment: string;
  /** Release-wide labels from settings; never override selector labels */
  extra?: Readonly<Record<string, string>>;
}

export function manifestLabels(selector: SelectorLabels, options: ManifestLabelOptions): Record<string, string> {
  return {
    ...(options.extra ?? {}),
    [LABELS.managedBy]: MANAGED_BY,
    [LABELS.environment]: options.environment,
    app: selector.app,
    instance: selector.instance,
  };
}

/**
 * Annotations that differ between revisions of an otherwise unchanged object.
 * They are left out of the content checksum.
 */
export const REVISION_ANNOTATIONS: readonly string[] = [
  ANNOTATIONS.revision,
  ANNOTATIONS.settingsChecksum,
  ANNOTATIONS.hook,
];

export interface ManifestAnnotationOptions {
  revision: number;
  component: string;
  hookPhase: HookPhase;
  extra?: Readonly<Record<string, string>>;
}

export function manifestAnnotations(options: ManifestAnnotationOptions): Record<string, string> {
  const annotations: Record<string, string> = {
    ...(options.extra ?? {}),
    [ANNOTATIONS.revision]: String(options.revision),
    [ANNOTATIONS.component]: options.component,
  };
  if (options.hookPhase !== 'none') {
    annotations[ANNOTATIONS.hook] = options.hookPhase;
  }
  return annotations;
}

/**
 * Label selector string in the form the Kubernetes API takes, keys sorted
 */
export function toLabelSelector(labels: Readonly<Record<string, string>>): string {
  return Object.keys(labels)
    .sort()
    .map((key) => `${key}=${labels[key]}`)
    .join(',');
}
