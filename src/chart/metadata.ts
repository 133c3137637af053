/**
 * Object metadata and placement for chart manifests
 */

import type { V1ObjectMeta } from '@kubernetes/client-node';
import { manifestAnnotations, manifestLabels } from '../core/naming/index.js';
import type { Component, HookPhase, ResourcePlacement } from '../core/types/index.js';
import type { ChartContext } from './context.js';
import { COMPONENT_SCOPES, componentSelector, LOCAL_NAMES, type LocalName } from './names.js';
import { type ImageSettings, scopeConventions } from './schema.js';

export interface DescribeOptions {
  hookPhase?: HookPhase;
  annotations?: Readonly<Record<string, string>>;
}

export interface DescribedResource {
  metadata: V1ObjectMeta;
  placement: ResourcePlacement;
}

/**
 * Metadata and placement of one manifest owned by `component`
 */
export function describeResource(
  context: ChartContext,
  component: Component,
  localName: LocalName,
  options: DescribeOptions = {}
): DescribedResource {
  const hookPhase = options.hookPhase ?? 'none';
  return {
    metadata: {
      name: context.names[localName],
      namespace: context.identity.namespace,
      labels: podLabels(context, component),
      annotations: manifestAnnotations({
        revision: context.identity.revision,
        component,
        hookPhase,
        ...(options.annotations ? { extra: options.annotations } : {}),
      }),
    },
    placement: { component, localName: LOCAL_NAMES[localName], hookPhase },
  };
}

export function podLabels(context: ChartContext, component: Component): Record<string, string> {
  const conventions = scopeConventions(context.tree, COMPONENT_SCOPES[component]);
  return manifestLabels(componentSelector(context.identity.name, component), {
    environment: conventions.environment,
    extra: context.settings.global.labels,
  });
}

export function selectorFor(context: ChartContext, component: Component): Record<string, string> {
  const selector = componentSelector(context.identity.name, component);
  return { app: selector.app, instance: selector.instance };
}

export function imageReference(image: ImageSettings, registry: string | undefined): string {
  const reference = `${image.repository}:${image.tag}`;
  return registry ? `${registry.replace(/\/+$/, '')}/${reference}` : reference;
}

export function pullSecrets(context: ChartContext, component: Component): Array<{ name: string }> {
  return scopeConventions(context.tree, COMPONENT_SCOPES[component]).imagePullSecrets.map((name) => ({
    name,
  }));
}
