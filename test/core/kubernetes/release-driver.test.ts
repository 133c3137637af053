import { PatchStrategy } from '@kubernetes/client-node';
import { describe, expect, it, vi } from 'vitest';
import { DriverError } from '../../../src/core/errors.js';
import { KubernetesReleaseDriver } from '../../../src/core/kubernetes/index.js';
import type { ReleaseRecord } from '../../../src/core/types/index.js';
import { configMap } from '../../../src/factories/index.js';

const apiError = (code: number, body?: unknown) => Object.assign(new Error(`HTTP-Code: ${code}`), { code, body });

function createDriver() {
  const objectApi = { read: vi.fn(), patch: vi.fn(), delete: vi.fn() };
  const coreApi = {
    readNamespace: vi.fn(),
    createNamespace: vi.fn(),
    listNamespacedSecret: vi.fn(),
    createNamespacedSecret: vi.fn(),
    replaceNamespacedSecret: vi.fn(),
    deleteCollectionNamespacedSecret: vi.fn(),
    listNamespacedPod: vi.fn(),
    readNamespacedPodLog: vi.fn(),
  };
  return { objectApi, coreApi, driver: new KubernetesReleaseDriver({ objectApi, coreApi }) };
}

const appConfig = configMap(
  { metadata: { name: 'cat-api-release-app-config', namespace: 'cat-api-ns' }, data: { LOG_LEVEL: 'info' } },
  { component: 'application', localName: 'app-config' }
);

const configRef = { apiVersion: 'v1', kind: 'ConfigMap', name: 'cat-api-release-app-config', namespace: 'cat-api-ns' };

const record: ReleaseRecord = {
  releaseName: 'cat-api-release',
  namespace: 'cat-api-ns',
  revision: 1,
  status: 'deployed',
  resources: [configRef],
  migration: { status: 'succeeded', checksum: 'abc', taskName: 'cat-api-release-migration' },
  settingsChecksum: 'def',
  updatedAt: '2026-01-01T00:00:00.000Z',
  description: 'Install complete',
};

const encoded = (value: ReleaseRecord) => Buffer.from(JSON.stringify(value)).toString('base64');

describe('KubernetesReleaseDriver', () => {
  describe('ensureNamespace', () => {
    it('should leave an existing namespace alone', async () => {
      const { coreApi, driver } = createDriver();
      coreApi.readNamespace.mockResolvedValue({ metadata: { name: 'cat-api-ns' } });

      await driver.ensureNamespace('cat-api-ns');

      expect(coreApi.readNamespace).toHaveBeenCalledWith({ name: 'cat-api-ns' });
      expect(coreApi.createNamespace).not.toHaveBeenCalled();
    });

    it('should create a missing namespace', async () => {
      const { coreApi, driver } = createDriver();
      coreApi.readNamespace.mockRejectedValue(apiError(404));

      await driver.ensureNamespace('cat-api-ns');

      expect(coreApi.createNamespace).toHaveBeenCalledWith({ body: { metadata: { name: 'cat-api-ns' } } });
    });

    it('should accept a namespace created concurrently', async () => {
      const { coreApi, driver } = createDriver();
      coreApi.readNamespace.mockRejectedValue(apiError(404));
      coreApi.createNamespace.mockRejectedValue(apiError(409));

      await expect(driver.ensureNamespace('cat-api-ns')).resolves.toBeUndefined();
    });

    it('should surface other failures as driver errors', async () => {
      const { coreApi, driver } = createDriver();
      coreApi.readNamespace.mockRejectedValue(apiError(403, { reason: 'Forbidden', message: 'namespaces is forbidden' }));

      await expect(driver.ensureNamespace('cat-api-ns')).rejects.toThrow(
        'readNamespace failed: Kubernetes API error (403): Forbidden: namespaces is forbidden'
      );
    });
  });

  describe('apply', () => {
    const serverSideApply = [undefined, undefined, 'chartwright', true, PatchStrategy.ServerSideApply];

    it('should server-side apply an object that does not exist', async () => {
      const { objectApi, driver } = createDriver();
      objectApi.read.mockRejectedValue(apiError(404));

      await driver.apply(appConfig);

      expect(objectApi.patch).toHaveBeenCalledWith(appConfig.payload, ...serverSideApply);
      const body: unknown = objectApi.patch.mock.calls[0]?.[0];
      expect(body).not.toBe(appConfig.payload);
      expect(Object.isFrozen(body)).toBe(false);
    });

    it('should server-side apply an object that exists so dropped fields are removed', async () => {
      const { objectApi, driver } = createDriver();
      objectApi.read.mockResolvedValue({ ...appConfig.payload, data: { LOG_LEVEL: 'debug', FOO: 'stale' } });

      await driver.apply(appConfig);

      expect(objectApi.patch).toHaveBeenCalledTimes(1);
      expect(objectApi.patch).toHaveBeenCalledWith(appConfig.payload, ...serverSideApply);
    });

    it('should not retry a failed write', async () => {
      const { objectApi, driver } = createDriver();
      objectApi.read.mockRejectedValue(apiError(404));
      objectApi.patch.mockRejectedValue(apiError(422, { reason: 'Invalid', message: 'data is invalid' }));

      await expect(driver.apply(appConfig)).rejects.toBeInstanceOf(DriverError);
      expect(objectApi.patch).toHaveBeenCalledTimes(1);
    });
  });

  describe('read and delete', () => {
    it('should read a missing object as undefined', async () => {
      const { objectApi, driver } = createDriver();
      objectApi.read.mockRejectedValue(apiError(404));

      expect(await driver.read(configRef)).toBeUndefined();
      expect(objectApi.read).toHaveBeenCalledWith({
        apiVersion: 'v1',
        kind: 'ConfigMap',
        metadata: { name: 'cat-api-release-app-config', namespace: 'cat-api-ns' },
      });
    });

    it('should delete with background propagation', async () => {
      const { objectApi, driver } = createDriver();
      objectApi.delete.mockResolvedValue({});

      expect(await driver.delete(configRef)).toBe(true);
      expect(objectApi.delete).toHaveBeenCalledWith(
        {
          apiVersion: 'v1',
          kind: 'ConfigMap',
          metadata: { name: 'cat-api-release-app-config', namespace: 'cat-api-ns' },
        },
        undefined,
        undefined,
        undefined,
        undefined,
        'Background'
      );
    });

    it('should report an object that was already gone', async () => {
      const { objectApi, driver } = createDriver();
      objectApi.delete.mockRejectedValue(apiError(404));

      expect(await driver.delete(configRef)).toBe(false);
    });
  });

  describe('release records', () => {
    it('should store each revision in its own labelled Secret', async () => {
      const { coreApi, driver } = createDriver();

      await driver.writeReleaseRecord(record);

      expect(coreApi.createNamespacedSecret).toHaveBeenCalledWith({
        namespace: 'cat-api-ns',
        body: {
          apiVersion: 'v1',
          kind: 'Secret',
          metadata: {
            name: 'chartwright.release.cat-api-release.v1',
            namespace: 'cat-api-ns',
            labels: { owner: 'chartwright', name: 'cat-api-release', version: '1', status: 'deployed' },
          },
          type: 'chartwright.io/release.v1',
          data: { release: encoded(record) },
        },
      });
    });

    it('should replace a record that already exists', async () => {
      const { coreApi, driver } = createDriver();
      coreApi.createNamespacedSecret.mockRejectedValue(apiError(409));

      await driver.writeReleaseRecord({ ...record, status: 'superseded' });

      expect(coreApi.replaceNamespacedSecret).toHaveBeenCalledTimes(1);
      expect(coreApi.replaceNamespacedSecret.mock.calls[0]?.[0]).toMatchObject({
        name: 'chartwright.release.cat-api-release.v1',
        namespace: 'cat-api-ns',
      });
    });

    it('should list records oldest first', async () => {
      const { coreApi, driver } = createDriver();
      const second = { ...record, revision: 2 };
      coreApi.listNamespacedSecret.mockResolvedValue({
        items: [
          { metadata: { name: 'chartwright.release.cat-api-release.v2' }, data: { release: encoded(second) } },
          { metadata: { name: 'chartwright.release.cat-api-release.v1' }, data: { release: encoded(record) } },
        ],
      });

      const records = await driver.listReleaseRecords('cat-api-release', 'cat-api-ns');

      expect(records.map((item) => item.revision)).toEqual([1, 2]);
      expect(records[0]).toEqual(record);
      expect(coreApi.listNamespacedSecret).toHaveBeenCalledWith({
        namespace: 'cat-api-ns',
        labelSelector: 'name=cat-api-release,owner=chartwright',
      });
    });

    it('should refuse a record it cannot read', async () => {
      const { coreApi, driver } = createDriver();
      coreApi.listNamespacedSecret.mockResolvedValue({
        items: [
          {
            metadata: { name: 'chartwright.release.cat-api-release.v1' },
            data: { release: Buffer.from('{"revision":"one"}').toString('base64') },
          },
        ],
      });

      await expect(driver.listReleaseRecords('cat-api-release', 'cat-api-ns')).rejects.toBeInstanceOf(DriverError);
    });

    it('should delete every record of the release', async () => {
      const { coreApi, driver } = createDriver();

      await driver.deleteReleaseRecords('cat-api-release', 'cat-api-ns');

      expect(coreApi.deleteCollectionNamespacedSecret).toHaveBeenCalledWith({
        namespace: 'cat-api-ns',
        labelSelector: 'name=cat-api-release,owner=chartwright',
      });
    });
  });

  describe('readLogs', () => {
    it('should read init and regular containers of every selected pod', async () => {
      const { coreApi, driver } = createDriver();
      coreApi.listNamespacedPod.mockResolvedValue({
        items: [
          {
            metadata: { name: 'cat-api-release-app-1' },
            spec: { initContainers: [{ name: 'wait-for-database' }], containers: [{ name: 'cat-api' }] },
          },
        ],
      });
      coreApi.readNamespacedPodLog.mockResolvedValueOnce('database is up\n').mockResolvedValueOnce('serving\n');

      const logs = await driver.readLogs({ namespace: 'cat-api-ns', labelSelector: 'app=cat-api', tailLines: 20 });

      expect(logs).toEqual([
        { pod: 'cat-api-release-app-1', container: 'wait-for-database', content: 'database is up\n' },
        { pod: 'cat-api-release-app-1', container: 'cat-api', content: 'serving\n' },
      ]);
      expect(coreApi.readNamespacedPodLog).toHaveBeenLastCalledWith({
        name: 'cat-api-release-app-1',
        namespace: 'cat-api-ns',
        container: 'cat-api',
        tailLines: 20,
      });
    });
  });
});
