/**
 * Release record encoding
 *
 * Records are stored as JSON and validated on the way back in, so a record
 * written by an incompatible version fails loudly instead of being trusted.
 */

import { type } from 'arktype';
import { DriverError } from '../errors.js';
import type { ReleaseRecord, ResourceRef } from '../types/index.js';

export const RELEASE_RECORD_OWNER = 'chartwright';

const ResourceRefSchema = type({
  apiVersion: 'string',
  kind: 'string',
  name: 'string',
  namespace: 'string',
});

export const ReleaseRecordSchema = type({
  releaseName: 'string',
  namespace: 'string',
  revision: 'number.integer >= 1',
  status: '"deployed" | "failed" | "superseded"',
  resources: ResourceRefSchema.array(),
  migration: {
    status: '"skipped" | "disabled" | "succeeded" | "failed"',
    'checksum?': 'string',
    'taskName?': 'string',
    'reason?': '"TaskFailed" | "Timeout"',
    'message?': 'string',
  },
  settingsChecksum: 'string',
  updatedAt: 'string',
  'description?': 'string',
});

/**
 * Object name a record is stored under, e.g. `chartwright.release.cat-api-release.v3`
 */
export function releaseRecordName(releaseName: string, revision: number): string {
  return `${RELEASE_RECORD_OWNER}.release.${releaseName}.v${revision}`;
}

export function encodeReleaseRecord(record: ReleaseRecord): string {
  return JSON.stringify(record);
}

export function decodeReleaseRecord(content: string, source: string): ReleaseRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new DriverError(
      `Release record ${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      'readReleaseRecord',
      undefined,
      error
    );
  }

  const record = ReleaseRecordSchema(parsed);
  if (record instanceof type.errors) {
    throw new DriverError(`Release record ${source} is invalid: ${record.summary}`, 'readReleaseRecord', undefined);
  }
  return record;
}

/**
 * Latest record with the given status, by revision
 */
export function latestRecord(
  records: readonly ReleaseRecord[],
  status?: ReleaseRecord['status']
): ReleaseRecord | undefined {
  return [...records]
    .filter((record) => status === undefined || record.status === status)
    .sort((a, b) => b.revision - a.revision)[0];
}

export function latestDeployedRecord(records: readonly ReleaseRecord[]): ReleaseRecord | undefined {
  return latestRecord(records, 'deployed');
}

/**
 * Every resource any revision recorded, oldest revision first, each once.
 * A failed upgrade only records what it got to, so earlier revisions count too.
 */
export function recordedResources(records: readonly ReleaseRecord[]): ResourceRef[] {
  const seen = new Set<string>();
  const resources: ResourceRef[] = [];
  for (const record of [...records].sort((a, b) => a.revision - b.revision)) {
    for (const ref of record.resources) {
      const key = `${ref.apiVersion}/${ref.kind}/${ref.namespace}/${ref.name}`;
      if (!seen.has(key)) {
        seen.add(key);
        resources.push(ref);
      }
    }
  }
  return resources;
}
