/**
 * CLI Output Utilities
 */

import chalk from 'chalk';
import { ChartwrightError } from '../core/errors.js';
import type { LifecycleEvent } from '../core/types/index.js';
import type { PodLog } from '../core/driver/index.js';
import type { LintFinding, StatusResult, UninstallResult } from '../operations/index.js';

export function success(message: string): void {
  console.log(`${chalk.green('✓')} ${message}`);
}

export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

export function warn(message: string): void {
  console.log(`${chalk.yellow('⚠')} ${message}`);
}

export function error(message: string): void {
  console.error(`${chalk.red('✗')} ${message}`);
}

/**
 * Operator-facing text of any failure, naming the phase where one is known
 */
export function describeError(err: unknown): string {
  if (err instanceof ChartwrightError) {
    return err.describe();
  }
  return err instanceof Error ? err.message : String(err);
}

export function progress(event: LifecycleEvent): void {
  switch (event.type) {
    case 'state-changed':
      console.log(chalk.cyan(`→ ${event.state ?? 'unknown'}`) + chalk.gray(` ${event.message}`));
      break;
    case 'failed':
      console.log(chalk.red(`  ${event.message}`));
      break;
    default:
      console.log(chalk.gray(`  ${event.message}`));
  }
}

export function printFindings(findings: readonly LintFinding[]): void {
  if (findings.length === 0) {
    success('No lint findings');
    return;
  }
  for (const finding of findings) {
    const badge = finding.severity === 'error' ? chalk.red('[error]') : chalk.yellow('[warning]');
    const where = finding.settingPath ? chalk.gray(` (setting: ${finding.settingPath})`) : '';
    console.log(`${badge} ${finding.rule}: ${finding.message}${where}`);
  }
}

export function printStatus(result: StatusResult): void {
  const { record } = result;
  console.log(`${chalk.bold('RELEASE')}    ${record.releaseName}`);
  console.log(`${chalk.bold('NAMESPACE')}  ${record.namespace}`);
  console.log(`${chalk.bold('REVISION')}   ${record.revision}`);
  console.log(`${chalk.bold('STATUS')}     ${statusBadge(record.status)}`);
  console.log(`${chalk.bold('MIGRATION')}  ${record.migration.status}`);
  console.log(`${chalk.bold('UPDATED')}    ${record.updatedAt}`);
  if (record.description) {
    console.log(`${chalk.bold('NOTES')}      ${record.description}`);
  }
  console.log('');

  const width = Math.max(8, ...result.resources.map(({ ref }) => `${ref.kind}/${ref.name}`.length));
  console.log(chalk.bold(`${'RESOURCE'.padEnd(width)}  READY  MESSAGE`));
  for (const { ref, status } of result.resources) {
    const ready = status.ready ? chalk.green('yes  ') : chalk.red('no   ');
    console.log(`${`${ref.kind}/${ref.name}`.padEnd(width)}  ${ready}  ${status.message ?? ''}`);
  }
}

export function printUninstall(result: UninstallResult): void {
  for (const resource of result.teardown.deletedResources) {
    console.log(chalk.gray(`  deleted ${resource}`));
  }
  for (const failure of result.teardown.errors) {
    error(`${failure.resourceId}: ${failure.error.message}`);
  }
}

export function printLogs(logs: readonly PodLog[]): void {
  if (logs.length === 0) {
    warn('No pods found');
    return;
  }
  for (const log of logs) {
    console.log(chalk.bold(`==> ${log.pod}/${log.container} <==`));
    console.log(log.content);
  }
}

function statusBadge(status: string): string {
  switch (status) {
    case 'deployed':
      return chalk.green(status);
    case 'failed':
      return chalk.red(status);
    default:
      return chalk.gray(status);
  }
}
