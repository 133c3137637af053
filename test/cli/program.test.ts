import { fileURLToPath } from 'node:url';
import { CommanderError } from 'commander';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createProgram } from '../../src/cli/program.js';
import { describeError } from '../../src/cli/output.js';
import { ConfigurationError, ReleaseStateError } from '../../src/core/errors.js';
import { FakeReleaseDriver } from '../utils/fake-driver.js';

const externalValues = fileURLToPath(new URL('../fixtures/values-external.yaml', import.meta.url));

function cli(driver = new FakeReleaseDriver(), env: NodeJS.ProcessEnv = {}) {
  const contexts: Array<string | undefined> = [];
  // A fresh program per run so option values do not carry over between parses
  const run = (...args: string[]) =>
    createProgram({
      env,
      exitOverride: true,
      scheduler: { pollIntervalMs: 0, successGraceMs: 0 },
      createDriver: (context) => {
        contexts.push(context);
        return driver;
      },
    }).parseAsync(args, { from: 'user' });
  return { driver, contexts, run };
}

describe('chartwright CLI', () => {
  let stdout: string[];

  beforeEach(() => {
    stdout = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('should install with the default namespace and release name', async () => {
    const { driver, run } = cli();

    await run('install');

    expect(driver.records[0]).toMatchObject({ releaseName: 'cat-api-release', namespace: 'cat-api-ns', revision: 1 });
  });

  it('should take defaults from the environment', async () => {
    const { driver, run } = cli(new FakeReleaseDriver(), { NAMESPACE: 'cats-staging', RELEASE_NAME: 'cats' });

    await run('install');

    expect(driver.records[0]).toMatchObject({ releaseName: 'cats', namespace: 'cats-staging' });
  });

  it('should hand the kubeconfig context to the driver factory', async () => {
    const { contexts, run } = cli();
    await run('install', '--context', 'staging');
    expect(contexts).toEqual(['staging']);
  });

  it('should apply repeated --set flags in order', async () => {
    const { run } = cli();

    await run('dry-run', '--set', 'application.replicaCount=3', '--set', 'application.replicaCount=4');

    expect(stdout.join('')).toContain('replicas: 4\n');
  });

  it('should render without building a driver', async () => {
    const { contexts, run } = cli();

    await run('dry-run', '-n', 'staging');

    expect(contexts).toEqual([]);
    expect(stdout.join('').startsWith('---\n# Source: application/ConfigMap\n')).toBe(true);
  });

  it('should read VALUES_FILE when no values file is given', async () => {
    const { run } = cli(new FakeReleaseDriver(), { VALUES_FILE: externalValues });

    await run('dry-run');

    const output = stdout.join('');
    expect(output).toContain('value: ext.example.com\n');
    expect(output).not.toContain('kind: StatefulSet');
  });

  it('should print redacted values', async () => {
    const { run } = cli();

    await run('show-values', '--set-secret', 'database.password=test-secret');

    const output = stdout.join('');
    expect(output).not.toContain('test-secret');
  });

  it('should fail lint through the exit code', async () => {
    const { run } = cli();

    await run('lint', '--set', 'application.image.tag=latest');

    expect(process.exitCode).toBe(1);
  });

  it('should upgrade with --install when nothing is deployed', async () => {
    const { driver, run } = cli();

    await run('upgrade', '--install', '--no-wait', '--timeout', '30', '--description', 'first rollout');

    expect(driver.records[0]).toMatchObject({ revision: 1, status: 'deployed', description: 'first rollout' });
  });

  it('should reject a timeout that is not a positive integer', async () => {
    const { run } = cli();
    await expect(run('install', '--timeout', 'soon')).rejects.toBeInstanceOf(CommanderError);
  });

  it('should report a partial uninstall as a failure', async () => {
    const { driver, run } = cli();
    await run('install');
    driver.failures.add('delete:Deployment');

    await expect(run('uninstall')).rejects.toBeInstanceOf(ReleaseStateError);
    expect(driver.records).toHaveLength(1);
  });

  it('should pass --tail to the log request', async () => {
    const { driver, run } = cli();

    await run('logs-app', '--tail', '20');

    expect(driver.logRequests).toEqual([
      { namespace: 'cat-api-ns', labelSelector: 'app=cat-api,instance=cat-api-release', tailLines: 20 },
    ]);
  });

  it('should name the failing phase', async () => {
    const { run } = cli();

    const failure = await run('install', '--set', 'database.mode=external').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ConfigurationError);
    expect(describeError(failure)).toBe(
      '[render] External database mode requires database.host to be set (setting: database.host)'
    );
  });
});
