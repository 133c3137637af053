import { describe, expect, it } from 'vitest';
import { RolloutTimeoutError } from '../../../src/core/errors.js';
import { ResourceReadinessWaiter } from '../../../src/core/lifecycle/index.js';
import { configMap, deployment } from '../../../src/factories/index.js';
import { FakeReleaseDriver } from '../../utils/fake-driver.js';

const config = { timeout: 5, initialDelay: 0, maxDelay: 0, backoffMultiplier: 1.5 };

const app = deployment(
  {
    metadata: { name: 'cat-api-release-app', namespace: 'cat-api-ns' },
    spec: {
      replicas: 2,
      selector: { matchLabels: { app: 'cat-api' } },
      template: { spec: { containers: [{ name: 'cat-api', image: 'cat-api:1.0.0' }] } },
    },
  },
  { component: 'application', localName: 'app' }
);

const appConfig = configMap(
  { metadata: { name: 'cat-api-release-app-config', namespace: 'cat-api-ns' }, data: {} },
  { component: 'application', localName: 'app-config' }
);

describe('ResourceReadinessWaiter', () => {
  it('should report a missing object as not found', async () => {
    const waiter = new ResourceReadinessWaiter(new FakeReleaseDriver(), config);
    expect(await waiter.check(app)).toEqual({
      ready: false,
      reason: 'NotFound',
      message: 'Deployment/cat-api-release-app does not exist',
    });
  });

  it('should return once the workload is ready', async () => {
    const driver = new FakeReleaseDriver();
    await driver.apply(app);
    const status = await new ResourceReadinessWaiter(driver, config).waitForReady(app);
    expect(status.ready).toBe(true);
  });

  it('should not poll for kinds that are ready when created', async () => {
    const driver = new FakeReleaseDriver();
    const status = await new ResourceReadinessWaiter(driver, config).waitForReady(appConfig);
    expect(status).toEqual({ ready: true, message: 'ConfigMap is ready when created' });
    expect(driver.targets('read')).toEqual([]);
  });

  it('should time out with the last status message', async () => {
    const driver = new FakeReleaseDriver({ workloadsReady: false });
    await driver.apply(app);

    await expect(new ResourceReadinessWaiter(driver, config).waitForReady(app)).rejects.toThrow(
      new RolloutTimeoutError('deploymentApp', 5, 'Waiting for replicas: 0/2 ready, 0/2 available')
    );
  });
});
