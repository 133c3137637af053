/**
 * Request and result types of the release operations
 */

import type { LifecycleResult } from '../core/lifecycle/index.js';
import type { RenderedRelease } from '../core/rendering/index.js';
import type {
  ProgressCallback,
  ReleaseRecord,
  ResourceRef,
  ResourceStatus,
  TeardownResult,
} from '../core/types/index.js';

export interface ReleaseRequest {
  namespace?: string | undefined;
  releaseName?: string | undefined;
  /** Values files, lowest precedence first */
  valuesFiles?: readonly string[] | undefined;
  /** `--set` expressions */
  set?: readonly string[] | undefined;
  /** `--set-secret` expressions; always sensitive and never typed */
  setSecret?: readonly string[] | undefined;
}

export interface DeployRequest extends ReleaseRequest {
  /** Overrides both the migration and the rollout timeout */
  timeoutSeconds?: number | undefined;
  /** Wait for workloads to become ready; defaults to true */
  wait?: boolean | undefined;
  description?: string | undefined;
  progressCallback?: ProgressCallback | undefined;
}

export interface UpgradeRequest extends DeployRequest {
  /** Install when no deployed release exists */
  install?: boolean | undefined;
}

export interface DryRunRequest extends ReleaseRequest {
  /** Revision to render for; defaults to 1 */
  revision?: number | undefined;
}

export interface DeployResult {
  release: RenderedRelease;
  record: ReleaseRecord;
  lifecycle: LifecycleResult;
}

export interface DryRunResult {
  release: RenderedRelease;
  yaml: string;
}

export type LintSeverity = 'error' | 'warning';

export interface LintFinding {
  rule: string;
  severity: LintSeverity;
  message: string;
  resourceId?: string | undefined;
  settingPath?: string | undefined;
}

export interface LintResult {
  /** False when any finding is an error */
  passed: boolean;
  findings: LintFinding[];
}

export interface ResourceStatusReport {
  ref: ResourceRef;
  status: ResourceStatus;
}

export interface StatusResult {
  record: ReleaseRecord;
  resources: ResourceStatusReport[];
  ready: boolean;
}

export interface LogsRequest extends ReleaseRequest {
  tailLines?: number | undefined;
}

export interface UninstallResult {
  teardown: TeardownResult;
  /** Release records are removed only when every resource was deleted */
  recordsDeleted: boolean;
}

