import { ClusterQueryError } from '../src/common/errors';
import { PodDescriptor } from '../src/common/interfaces/pod-app.interface';
import { AppStatusReporter, findMainContainer, podStatusCategory } from '../src/core/app-status';
import { FakeGateway, createFakeGateway } from './helpers/fake-gateway';

const NOW = new Date('2024-06-10T12:00:00Z');

function pod(overrides: Partial<PodDescriptor> = {}): PodDescriptor {
  return {
    namespace: 'apps',
    name: 'billing-api-7d9f8-abcde',
    phase: 'Running',
    containers: [
      { name: 'istio-proxy', image: 'istio/proxyv2:1.20.0' },
      { name: 'main-billing', image: 'registry.local/billing:2.4.0-rc1' },
    ],
    creationTimestamp: new Date('2024-06-10T09:15:00Z'),
    ...overrides,
  };
}

describe('AppStatusReporter', () => {
  let gateway: FakeGateway;
  let reporter: AppStatusReporter;

  beforeEach(() => {
    gateway = createFakeGateway();
    reporter = new AppStatusReporter(gateway, {
      labelSelector: 'tgops=true',
      mainContainerPrefix: 'main-',
      now: () => NOW,
    });
  });

  it('should query pods with the configured selector', async () => {
    await reporter.listApps();

    expect(gateway.listLabeledPods).toHaveBeenCalledWith('tgops=true');
    expect(reporter.labelSelector).toBe('tgops=true');
  });

  it('should report image tag, version and age of the main container', async () => {
    gateway.listLabeledPods.mockResolvedValue([pod()]);

    await expect(reporter.listApps()).resolves.toEqual([
      {
        namespace: 'apps',
        podName: 'billing-api-7d9f8-abcde',
        phase: 'Running',
        statusCategory: 'running',
        imageTag: '2.4.0-rc1',
        version: '2.4.0',
        ageDisplay: '2h',
      },
    ]);
  });

  it('should skip pods without a main container', async () => {
    gateway.listLabeledPods.mockResolvedValue([
      pod({ name: 'sidecar-only', containers: [{ name: 'proxy', image: 'envoy:1.0' }] }),
      pod({ name: 'worker', phase: 'Failed' }),
    ]);

    const apps = await reporter.listApps();

    expect(apps.map((app) => app.podName)).toEqual(['worker']);
    expect(apps[0].statusCategory).toBe('failed');
  });

  it('should fall back to latest and Unknown for missing data', async () => {
    gateway.listLabeledPods.mockResolvedValue([
      pod({ phase: 'Pending', containers: [{ name: 'main-app' }], creationTimestamp: undefined }),
    ]);

    const [app] = await reporter.listApps();

    expect(app.imageTag).toBe('latest');
    expect(app.version).toBe('latest');
    expect(app.ageDisplay).toBe('Unknown');
    expect(app.statusCategory).toBe('other');
  });

  it('should wrap listing failures into ClusterQueryError', async () => {
    gateway.listLabeledPods.mockRejectedValue(new Error('Unauthorized'));

    await expect(reporter.listApps()).rejects.toBeInstanceOf(ClusterQueryError);
  });

  describe('helpers', () => {
    it('should map pod phases to status categories', () => {
      expect(podStatusCategory('Running')).toBe('running');
      expect(podStatusCategory('Failed')).toBe('failed');
      expect(podStatusCategory('Succeeded')).toBe('other');
    });

    it('should pick the first container with the prefix', () => {
      const containers = [{ name: 'init' }, { name: 'main-a' }, { name: 'main-b' }];
      expect(findMainContainer(containers, 'main-')).toEqual({ name: 'main-a' });
      expect(findMainContainer(containers, 'app-')).toBeUndefined();
    });
  });
});
