/**
 * Lint rules run over a rendered release
 */

import { DEFAULT_DATABASE_PASSWORD } from '../chart/index.js';
import type { RenderedRelease } from '../core/rendering/index.js';
import type { SettingsTree } from '../core/settings/index.js';
import type { ResourceManifest } from '../core/types/index.js';
import { arrayAt, getPath, numberAt, stringAt } from '../utils/index.js';
import type { LintFinding } from './types.js';

export interface LintRule {
  name: string;
  check(release: RenderedRelease, settings: SettingsTree): LintFinding[];
}

interface ContainerView {
  manifest: ResourceManifest;
  name: string;
  image: string;
  container: unknown;
}

const POD_TEMPLATE_KINDS = ['Deployment', 'StatefulSet', 'Job'];

function containersOf(release: RenderedRelease): ContainerView[] {
  return release.manifests
    .filter((manifest) => POD_TEMPLATE_KINDS.includes(manifest.kind))
    .flatMap((manifest) =>
      [
        ...arrayAt(manifest.payload, 'spec', 'template', 'spec', 'initContainers'),
        ...arrayAt(manifest.payload, 'spec', 'template', 'spec', 'containers'),
      ].map((container) => ({
        manifest,
        name: stringAt(container, 'name') ?? 'unnamed',
        image: stringAt(container, 'image') ?? '',
        container,
      }))
    );
}

/**
 * Tag of an image reference; undefined when the reference has none
 */
export function imageTag(image: string): string | undefined {
  const withoutDigest = image.split('@')[0] ?? image;
  const lastSegment = withoutDigest.slice(withoutDigest.lastIndexOf('/') + 1);
  const separator = lastSegment.indexOf(':');
  return separator === -1 ? undefined : lastSegment.slice(separator + 1);
}

export const latestTagRule: LintRule = {
  name: 'image-latest-tag',
  check: (release) =>
    containersOf(release)
      .filter(({ image }) => !image.includes('@') && (imageTag(image) ?? 'latest') === 'latest')
      .map(({ manifest, name, image }): LintFinding => ({
        rule: 'image-latest-tag',
        severity: 'error',
        message: `Container '${name}' of ${manifest.kind}/${manifest.name} uses the mutable image '${image}'`,
        resourceId: manifest.id,
      })),
};

export const resourceLimitsRule: LintRule = {
  name: 'resource-limits',
  check: (release) =>
    containersOf(release)
      .filter(
        ({ container }) =>
          getPath(container, ['resources', 'limits', 'cpu']) === undefined ||
          getPath(container, ['resources', 'limits', 'memory']) === undefined
      )
      .map(({ manifest, name }): LintFinding => ({
        rule: 'resource-limits',
        severity: 'warning',
        message: `Container '${name}' of ${manifest.kind}/${manifest.name} has no cpu or memory limit`,
        resourceId: manifest.id,
      })),
};

export const singleReplicaRule: LintRule = {
  name: 'single-replica',
  check: (release) => {
    const autoscaled = release.manifests.some((manifest) => manifest.kind === 'HorizontalPodAutoscaler');
    if (autoscaled) return [];
    return release.manifests
      .filter((manifest) => manifest.kind === 'Deployment' && numberAt(manifest.payload, 'spec', 'replicas') === 1)
      .map((manifest): LintFinding => ({
        rule: 'single-replica',
        severity: 'warning',
        message: `Deployment/${manifest.name} runs a single replica without autoscaling`,
        resourceId: manifest.id,
        settingPath: 'application.replicaCount',
      }));
  },
};

export const defaultDatabasePasswordRule: LintRule = {
  name: 'default-database-password',
  check: (release, settings) => {
    if (!release.components.includes('database')) return [];
    if (settings.get('database.password') !== DEFAULT_DATABASE_PASSWORD) return [];
    return [
      {
        rule: 'default-database-password',
        severity: 'warning',
        message: 'The bundled database uses the default password',
        settingPath: 'database.password',
      },
    ];
  },
};

export const LINT_RULES: readonly LintRule[] = [
  latestTagRule,
  resourceLimitsRule,
  singleReplicaRule,
  defaultDatabasePasswordRule,
];

export function lintRelease(
  release: RenderedRelease,
  settings: SettingsTree,
  rules: readonly LintRule[] = LINT_RULES
): LintFinding[] {
  return rules.flatMap((rule) => rule.check(release, settings));
}
