/**
 * YAML generation for rendered releases
 */

import * as yaml from 'js-yaml';
import type { ResourceManifest } from '../types/index.js';

export interface YamlSerializationOptions {
  indent?: number;
  lineWidth?: number;
  /** Prefix each document with a `# Source: component/Kind` comment (default: true) */
  sourceComments?: boolean;
}

export function manifestToYaml(manifest: ResourceManifest, options: YamlSerializationOptions = {}): string {
  // apiVersion and kind lead the document whatever order the factory built it in
  const document = Object.assign({ apiVersion: manifest.apiVersion, kind: manifest.kind }, manifest.payload);
  return yaml.dump(document, {
    indent: options.indent ?? 2,
    lineWidth: options.lineWidth ?? -1,
    noRefs: true,
    skipInvalid: true,
    sortKeys: false,
    quotingType: '"',
    forceQuotes: false,
  });
}

/**
 * Multi-document YAML stream of the manifests, in the given order
 */
export function serializeManifests(
  manifests: readonly ResourceManifest[],
  options: YamlSerializationOptions = {}
): string {
  const withComments = options.sourceComments ?? true;
  return manifests
    .map((manifest) => {
      const header = withComments ? `# Source: ${manifest.ownerComponent}/${manifest.kind}\n` : '';
      return `---\n${header}${manifestToYaml(manifest, options)}`;
    })
    .join('');
}

export function valuesToYaml(values: unknown): string {
  return yaml.dump(values, { indent: 2, lineWidth: -1, noRefs: true, sortKeys: false });
}
