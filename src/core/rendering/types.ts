/**
 * Rendering types
 */

import type { SettingsScope, SettingsTree } from '../settings/index.js';
import type { Component, ReleaseIdentity, ResourceManifest } from '../types/index.js';

export interface ComponentRenderer<TContext> {
  /** The single enable/mode evaluation point of a component */
  enabled(context: TContext): boolean;
  render(context: TContext): ResourceManifest[];
}

/**
 * A chart: its default scopes and one renderer for every component
 */
export interface ChartDefinition<TContext> {
  name: string;
  version: string;
  defaultScopes: readonly SettingsScope[];
  /**
   * Validate the resolved settings and derive everything the components
   * share. Throws before any manifest is rendered.
   */
  createContext(settings: SettingsTree, identity: ReleaseIdentity): TContext;
  components: { readonly [C in Component]: ComponentRenderer<TContext> };
}

export interface RenderedRelease {
  identity: ReleaseIdentity;
  chart: { name: string; version: string };
  /** Enabled components in render order */
  components: readonly Component[];
  manifests: readonly ResourceManifest[];
  /** Checksum of the whole resolved settings tree */
  settingsChecksum: string;
  /** Checksum of the migration hook, undefined when no hook is rendered */
  migrationChecksum: string | undefined;
}
