export {
  decodeReleaseRecord,
  encodeReleaseRecord,
  latestDeployedRecord,
  latestRecord,
  RELEASE_RECORD_OWNER,
  recordedResources,
  ReleaseRecordSchema,
  releaseRecordName,
} from './release-records.js';
export type { LogRequest, PodLog, ReleaseDriver } from './types.js';
