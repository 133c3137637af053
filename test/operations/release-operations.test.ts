import { load } from 'js-yaml';
import { describe, expect, it } from 'vitest';
import {
  ChartwrightError,
  ConfigurationError,
  DriverError,
  MigrationFailedError,
  ReleaseStateError,
} from '../../src/core/errors.js';
import type { LifecycleEvent } from '../../src/core/types/index.js';
import { ReleaseOperations } from '../../src/operations/index.js';
import { getPath } from '../../src/utils/index.js';
import { FakeReleaseDriver, type FakeDriverOptions } from '../utils/fake-driver.js';

function setup(options: FakeDriverOptions = {}) {
  const driver = new FakeReleaseDriver(options);
  const operations = new ReleaseOperations({
    driver,
    scheduler: { pollIntervalMs: 0, successGraceMs: 0 },
  });
  return { driver, operations };
}

async function phaseOf(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (error) {
    return error instanceof ChartwrightError ? error.phase : undefined;
  }
  throw new Error('Expected the operation to fail');
}

describe('ReleaseOperations', () => {
  describe('install', () => {
    it('should deploy revision 1 and record it', async () => {
      const { driver, operations } = setup();

      const result = await operations.install();

      expect(result.record).toMatchObject({
        releaseName: 'cat-api-release',
        namespace: 'cat-api-ns',
        revision: 1,
        status: 'deployed',
        description: 'Install complete',
      });
      expect(result.record.migration.status).toBe('succeeded');
      expect(result.record.resources).toHaveLength(7);
      expect(driver.targets('writeReleaseRecord')).toEqual(['cat-api-release.v1:deployed']);
    });

    it('should refuse to install over a deployed release', async () => {
      const { operations } = setup();
      await operations.install();

      await expect(operations.install()).rejects.toThrow(
        "Release 'cat-api-release' is already deployed at revision 1; use upgrade"
      );
    });

    it('should pass progress events to the caller', async () => {
      const { operations } = setup();
      const events: LifecycleEvent[] = [];

      await operations.install({ progressCallback: (event) => events.push(event) });

      expect(events.at(-1)?.type).toBe('completed');
      expect(events.filter((event) => event.type === 'state-changed').map((event) => event.state)).toEqual([
        'MigrationPending',
        'MigrationRunning',
        'MigrationSucceeded',
        'WorkloadRollout',
        'Complete',
      ]);
    });

    it('should name the resolve phase for invalid settings', async () => {
      const { driver, operations } = setup();

      const failure = operations.install({ set: ['application.replicaCount=many'] });

      await expect(failure).rejects.toBeInstanceOf(ConfigurationError);
      expect(await phaseOf(operations.install({ set: ['application.replicaCount=many'] }))).toBe('resolve');
      expect(driver.calls).toEqual([]);
    });

    it('should name the render phase for contradictory settings', async () => {
      const { operations } = setup();
      expect(await phaseOf(operations.install({ set: ['database.mode=external'] }))).toBe('render');
    });
  });

  describe('failures during deploy', () => {
    it('should record a failed migration and stop', async () => {
      const { driver, operations } = setup({ migration: 'fail' });

      await expect(operations.install()).rejects.toBeInstanceOf(MigrationFailedError);

      const [record] = driver.records;
      expect(record?.status).toBe('failed');
      expect(record?.migration.reason).toBe('TaskFailed');
      expect(record?.resources.map((ref) => ref.kind)).toContain('Job');
      expect(driver.targets('apply')).not.toContain('Deployment/cat-api-release-app');
    });

    it('should describe a failed migration with its phase', async () => {
      const { operations } = setup({ migration: 'fail' });

      try {
        await operations.install();
        expect.unreachable('the migration fails');
      } catch (error) {
        expect(error instanceof MigrationFailedError && error.describe()).toBe(
          '[migrate] Migration task cat-api-release-migration exited with a non-zero status'
        );
      }
    });

    it('should record what was applied before a driver error', async () => {
      const { driver, operations } = setup();
      driver.failures.add('apply:StatefulSet');

      await expect(operations.install()).rejects.toBeInstanceOf(DriverError);

      const [record] = driver.records;
      expect(record?.status).toBe('failed');
      expect(record?.resources.map((ref) => `${ref.kind}/${ref.name}`)).toEqual([
        'ConfigMap/cat-api-release-app-config',
        'Secret/cat-api-release-app-secret',
        'ConfigMap/cat-api-release-postgres-config',
        'Secret/cat-api-release-postgres-secret',
        'Service/cat-api-release-postgres-headless',
      ]);
    });

    it('should raise the deploy error when recording the failure also fails', async () => {
      const { driver, operations } = setup();
      driver.failures.add('apply:StatefulSet');
      driver.failures.add('writeReleaseRecord');

      const error = await operations.install().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(DriverError);
      expect(error instanceof DriverError && error.message).toBe(
        'apply StatefulSet/cat-api-release-postgres failed: forbidden'
      );
      expect(driver.records).toEqual([]);
    });

    it('should retry an install after a failed first attempt', async () => {
      const { driver, operations } = setup({ migration: 'fail' });
      await expect(operations.install()).rejects.toBeInstanceOf(MigrationFailedError);

      driver.migration = 'succeed';
      const result = await operations.install();

      expect(result.record.revision).toBe(1);
      expect(result.record.status).toBe('deployed');
      expect(result.lifecycle.migration.status).toBe('succeeded');
    });
  });

  describe('upgrade', () => {
    it('should refuse to upgrade a release that is not installed', async () => {
      const { operations } = setup();
      await expect(operations.upgrade()).rejects.toBeInstanceOf(ReleaseStateError);
    });

    it('should install when asked to', async () => {
      const { operations } = setup();
      expect((await operations.upgrade({ install: true })).record.revision).toBe(1);
    });

    it('should skip an unchanged migration and supersede the previous revision', async () => {
      const { driver, operations } = setup();
      await operations.install();

      const result = await operations.upgrade({ set: ['application.env.LOG_LEVEL=debug'] });

      expect(result.record.revision).toBe(2);
      expect(result.record.description).toBe('Upgrade complete');
      expect(result.record.migration.status).toBe('skipped');
      expect(driver.targets('apply').filter((target) => target.startsWith('Job/'))).toHaveLength(1);
      expect(driver.targets('writeReleaseRecord')).toEqual([
        'cat-api-release.v1:deployed',
        'cat-api-release.v2:deployed',
        'cat-api-release.v1:superseded',
      ]);
    });

    it('should run the migration again when the image changes', async () => {
      const { driver, operations } = setup();
      await operations.install();

      const result = await operations.upgrade({ set: ['application.image.tag=1.1.0'] });

      expect(result.record.migration.status).toBe('succeeded');
      expect(result.release.manifests.find((manifest) => manifest.id === 'jobMigration')?.hookPhase).toBe(
        'pre-upgrade'
      );
      expect(driver.targets('apply').filter((target) => target.startsWith('Job/'))).toHaveLength(2);
    });
  });

  describe('uninstall', () => {
    it('should delete every resource in reverse order and then the records', async () => {
      const { driver, operations } = setup();
      await operations.install();

      const result = await operations.uninstall();

      expect(result.teardown.status).toBe('success');
      expect(result.recordsDeleted).toBe(true);
      expect(driver.targets('delete').slice(-7)).toEqual([
        'Deployment/cat-api-release-app',
        'StatefulSet/cat-api-release-postgres',
        'Service/cat-api-release-postgres-headless',
        'Secret/cat-api-release-postgres-secret',
        'ConfigMap/cat-api-release-postgres-config',
        'Secret/cat-api-release-app-secret',
        'ConfigMap/cat-api-release-app-config',
      ]);
      expect(driver.records).toEqual([]);
    });

    it('should keep the records when a deletion fails', async () => {
      const { driver, operations } = setup();
      await operations.install();
      driver.failures.add('delete:StatefulSet');

      const result = await operations.uninstall();

      expect(result.teardown.status).toBe('partial');
      expect(result.recordsDeleted).toBe(false);
      expect(driver.records).toHaveLength(1);
    });

    it('should clean up the task retained by a failed migration', async () => {
      const { driver, operations } = setup({ migration: 'fail' });
      await expect(operations.install()).rejects.toBeInstanceOf(MigrationFailedError);

      await operations.uninstall();

      expect(driver.objects.size).toBe(0);
    });

    it('should report a release that does not exist', async () => {
      const { operations } = setup();
      expect(await phaseOf(operations.uninstall())).toBe('teardown');
    });
  });

  describe('dryRun and showValues', () => {
    const offline = new ReleaseOperations({
      driver: () => {
        throw new Error('dry runs never reach the cluster');
      },
    });

    it('should render YAML without a cluster', async () => {
      const result = await offline.dryRun({ namespace: 'staging', releaseName: 'cats' });

      expect(result.yaml.startsWith('---\n# Source: application/ConfigMap\napiVersion: v1\nkind: ConfigMap\n')).toBe(
        true
      );
      expect(result.release.manifests.every((manifest) => manifest.namespace === 'staging')).toBe(true);
      expect(result.release.identity.revision).toBe(1);
    });

    it('should redact sensitive values', async () => {
      const values: unknown = load(await offline.showValues({ setSecret: ['application.secretEnv.API_KEY=test-secret'] }));

      expect(getPath(values, ['application', 'secretEnv', 'API_KEY'])).toBe('<redacted>');
      expect(getPath(values, ['database', 'password'])).toBe('<redacted>');
      expect(getPath(values, ['application', 'replicaCount'])).toBe(2);
    });
  });

  describe('status and logs', () => {
    it('should report every recorded resource as ready after install', async () => {
      const { operations } = setup();
      await operations.install();

      const status = await operations.status();

      expect(status.ready).toBe(true);
      expect(status.record.revision).toBe(1);
      expect(status.resources).toHaveLength(7);
    });

    it('should report resources missing from the cluster', async () => {
      const { driver, operations } = setup();
      await operations.install();
      driver.objects.delete('Deployment/cat-api-ns/cat-api-release-app');

      const status = await operations.status();

      expect(status.ready).toBe(false);
      expect(status.resources.find((resource) => resource.ref.kind === 'Deployment')?.status).toEqual({
        ready: false,
        reason: 'NotFound',
        message: 'Deployment/cat-api-release-app does not exist',
      });
    });

    it('should select pods by component labels', async () => {
      const { driver, operations } = setup();
      driver.logs.push({ pod: 'cat-api-release-app-1', container: 'cat-api', content: 'ok\n' });

      expect(await operations.logsApp({ tailLines: 50 })).toEqual(driver.logs);
      await operations.logsDb();

      expect(driver.logRequests).toEqual([
        { namespace: 'cat-api-ns', labelSelector: 'app=cat-api,instance=cat-api-release', tailLines: 50 },
        { namespace: 'cat-api-ns', labelSelector: 'app=postgres,instance=cat-api-release' },
      ]);
    });
  });
});
