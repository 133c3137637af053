export {
  defaultDatabasePasswordRule,
  imageTag,
  LINT_RULES,
  latestTagRule,
  type LintRule,
  lintRelease,
  resourceLimitsRule,
  singleReplicaRule,
} from './lint.js';
export {
  overrideScopes,
  ReleaseOperations,
  type ReleaseOperationsOptions,
  resolveSettings,
} from './release-operations.js';
export type * from './types.js';
