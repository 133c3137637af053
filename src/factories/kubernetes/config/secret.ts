import type { V1Secret } from '@kubernetes/client-node';
import type { ResourceManifest, ResourcePlacement } from '../../../core/types/index.js';
import { encodeBase64 } from '../../../utils/index.js';
import { createResource, type Payload, type ResourceInput } from '../../shared.js';

export type SecretPayload = Payload<V1Secret>;

/**
 * Secret factory. Values passed as `stringData` are base64-encoded into
 * `data` so the rendered manifest never carries them in plain text.
 */
export function secret(
  resource: ResourceInput<V1Secret>,
  placement: ResourcePlacement
): ResourceManifest<SecretPayload> {
  const { stringData, data, ...rest } = resource;
  const encoded: Record<string, string> = { ...(data ?? {}) };
  for (const key of Object.keys(stringData ?? {}).sort()) {
    encoded[key] = encodeBase64(stringData?.[key] ?? '');
  }

  return createResource(
    {
      ...rest,
      apiVersion: 'v1',
      kind: 'Secret',
      type: resource.type ?? 'Opaque',
      data: encoded,
    },
    placement
  );
}
