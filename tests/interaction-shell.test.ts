import { InteractionShell } from '../src/bot/interaction-shell';
import { ClusterWriteError } from '../src/common/errors';
import { AppStatusReporter } from '../src/core/app-status';
import { LogLinkDirectory } from '../src/core/log-links';
import { ReconciliationDriver } from '../src/core/reconciliation';
import { ReleaseHealthAggregator } from '../src/core/release-health';
import {
  FakeGateway,
  createFakeGateway,
  readyFalse,
  reconcilingProgressing,
  record,
  snapshot,
  stalledTrue,
} from './helpers/fake-gateway';
import { FakeResponder, createFakeResponder, texts } from './helpers/fake-responder';

const NOW = new Date('2024-06-10T12:00:00Z');

describe('InteractionShell', () => {
  let gateway: FakeGateway;
  let responder: FakeResponder;
  let logLinks: LogLinkDirectory;

  const shell = () =>
    new InteractionShell({
      releases: new ReleaseHealthAggregator(gateway),
      reconciler: new ReconciliationDriver(gateway),
      apps: new AppStatusReporter(gateway, { labelSelector: 'tgops=true', mainContainerPrefix: 'main-', now: () => NOW }),
      logLinks,
    });

  const runCommand = (command: string, args: string[] = []) =>
    shell().handle({ kind: 'command', userId: 1001, command, args, responder });

  const runCallback = (data: string) => shell().handle({ kind: 'callback', userId: 1001, data, responder });

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    gateway = createFakeGateway();
    responder = createFakeResponder();
    logLinks = new LogLinkDirectory({
      api: 'https://logs.example.test/api',
      'api-worker': 'https://logs.example.test/api_worker',
      web: 'https://logs.example.test/web',
    });
  });

  describe('basic commands', () => {
    it('should greet on /start', async () => {
      await expect(runCommand('start')).resolves.toEqual({ status: 'ok' });
      expect(texts(responder.reply)).toEqual([
        'Hello! I am a Kubernetes-aware Telegram bot. Use /help to see available commands.',
      ]);
    });

    it('should list commands on /help', async () => {
      await runCommand('help');
      expect(texts(responder.reply)).toEqual([
        'Available commands:\n' +
          '/checkreleases - List unhealthy Flux HelmReleases and manage them\n' +
          '/apps - List apps status\n' +
          '/logs [app] - Show log links for applications (optional: filter by app name)',
      ]);
    });

    it('should point unknown commands to /help', async () => {
      await runCommand('restart');
      expect(texts(responder.reply)).toEqual(['Unknown command /restart. Use /help to see available commands.']);
    });
  });

  describe('/checkreleases', () => {
    it('should celebrate when everything is healthy', async () => {
      gateway.listHelmReleases.mockResolvedValue([snapshot('apps', 'web', [{ type: 'Ready', status: 'True' }])]);

      await runCommand('checkreleases');

      expect(texts(responder.reply)).toEqual(['All HelmReleases are healthy! 🎉']);
    });

    it('should render each unhealthy release with a reconcile action', async () => {
      gateway.listHelmReleases.mockResolvedValue([
        snapshot('apps', 'web', [readyFalse('upgrade `retries` exhausted'), stalledTrue]),
        snapshot('infra', 'ingress', [readyFalse('waiting'), reconcilingProgressing]),
        snapshot('apps', 'db', [{ type: 'Ready', status: 'Unknown' }]),
      ]);

      await expect(runCommand('checkreleases')).resolves.toEqual({ status: 'ok' });

      expect(responder.reply.mock.calls.map(([message]) => message)).toEqual([
        { text: '⚠️ Found unhealthy HelmReleases:' },
        {
          text:
            '⛔️ *apps/web*\n' +
            '├─ Status: STALLED\n' +
            '├─ Last Transition: 2024-05-01T10:00:00Z\n' +
            "└─ Error: `upgrade 'retries' exhausted`",
          markdown: true,
          actions: [[{ label: '🔄 Reconcile', token: 'toggle:apps:web' }]],
        },
        {
          text:
            '♻️ *infra/ingress*\n' +
            '├─ Status: RECONCILING\n' +
            '├─ Last Transition: 2024-05-01T10:00:00Z\n' +
            '└─ Error: `waiting`',
          markdown: true,
          actions: undefined,
        },
        {
          text:
            '🔄 *apps/db*\n' +
            '├─ Status: NOT READY\n' +
            '├─ Last Transition: Unknown\n' +
            '└─ Error: `No error message provided`',
          markdown: true,
          actions: [[{ label: '🔄 Reconcile', token: 'toggle:apps:db' }]],
        },
      ]);
    });

    it('should leave out the action when the token would be too long', async () => {
      gateway.listHelmReleases.mockResolvedValue([snapshot('apps', 'x'.repeat(60), [readyFalse()])]);

      await runCommand('checkreleases');

      const [, release] = responder.reply.mock.calls.map(([message]) => message);
      expect(release.actions).toBeUndefined();
      expect(release.text.endsWith('\n_Reconcile button unavailable: release name too long_')).toBe(true);
    });

    it('should report read failures', async () => {
      gateway.listHelmReleases.mockRejectedValue(new Error('connection refused'));

      const result = await runCommand('checkreleases');

      expect(result.status).toBe('error');
      expect(texts(responder.reply)).toEqual(['Error checking HelmReleases: connection refused']);
    });
  });

  describe('/apps', () => {
    it('should render one block per application pod', async () => {
      gateway.listLabeledPods.mockResolvedValue([
        {
          namespace: 'apps',
          name: 'api-1',
          phase: 'Running',
          containers: [{ name: 'main-api', image: 'registry.local/api:1.2.0-b5' }],
          creationTimestamp: new Date('2024-06-08T12:00:00Z'),
        },
        {
          namespace: 'apps',
          name: 'web-1',
          phase: 'Failed',
          containers: [{ name: 'main-web', image: 'registry.local/web' }],
          creationTimestamp: new Date('2024-06-10T11:55:00Z'),
        },
      ]);

      await runCommand('apps');

      expect(texts(responder.reply)).toEqual([
        '🟢 apps/api-1\n   Status: Running\n   Image tag: 1.2.0-b5\n   Version: 1.2.0\n   Age: 2d\n\n' +
          '🔴 apps/web-1\n   Status: Failed\n   Image tag: latest\n   Version: latest\n   Age: 5m',
      ]);
    });

    it('should split long listings into several messages', async () => {
      gateway.listLabeledPods.mockResolvedValue(
        Array.from({ length: 60 }, (_, i) => ({
          namespace: 'apps',
          name: `pod-${'p'.repeat(40)}-${i}`,
          phase: 'Pending',
          containers: [{ name: 'main-app', image: 'app:1.0.0' }],
        })),
      );

      await runCommand('apps');

      const messages = texts(responder.reply);
      expect(messages.length).toBeGreaterThan(1);
      messages.forEach((message) => expect(message.length).toBeLessThanOrEqual(4096));
      expect(messages.join('').split('🟡').length - 1).toBe(60);
    });

    it('should name the selector when nothing matches', async () => {
      await runCommand('apps');
      expect(texts(responder.reply)).toEqual(['No pods found with label tgops=true']);
    });

    it('should report read failures', async () => {
      gateway.listLabeledPods.mockRejectedValue(new Error('Unauthorized'));

      await runCommand('apps');

      expect(texts(responder.reply)).toEqual(['Error searching pods: Unauthorized']);
    });
  });

  describe('/logs', () => {
    it('should list every link with an action per application', async () => {
      await runCommand('logs');

      expect(responder.reply).toHaveBeenCalledWith({
        text:
          '📋 Application Log Links:\n\n' +
          '📊 [api](https://logs.example.test/api)\n\n' +
          '📊 [api-worker](https://logs.example.test/api_worker)\n\n' +
          '📊 [web](https://logs.example.test/web)\n\n',
        markdown: true,
        disablePreview: true,
        actions: [
          [{ label: '📊 api', token: 'logs:api' }],
          [{ label: '📊 api-worker', token: 'logs:api-worker' }],
          [{ label: '📊 web', token: 'logs:web' }],
        ],
      });
    });

    it('should filter by the first argument without actions', async () => {
      await runCommand('logs', ['API']);

      expect(responder.reply).toHaveBeenCalledWith({
        text:
          '📋 Application Log Links:\n\n' +
          '🔍 [api](https://logs.example.test/api)\n\n' +
          '🔍 [api-worker](https://logs.example.test/api_worker)\n\n',
        markdown: true,
        disablePreview: true,
        actions: undefined,
      });
    });

    it('should say when the filter matches nothing', async () => {
      await runCommand('logs', ['Payments']);
      expect(texts(responder.reply)).toEqual(["No log links found for application matching 'payments'"]);
    });

    it('should keep entity markers in application names out of the link text', async () => {
      logLinks = new LogLinkDirectory({ billing_api: 'https://logs.example.test/billing' });

      await runCommand('logs', ['billing']);

      expect(texts(responder.reply)).toEqual([
        '📋 Application Log Links:\n\n🔍 billing\\_api: [logs](https://logs.example.test/billing)\n\n',
      ]);
    });

    it('should explain how to configure links when there are none', async () => {
      logLinks = new LogLinkDirectory();

      await runCommand('logs');

      expect(texts(responder.reply)).toEqual([
        'No application log links are configured. Set the APP_LOGS_MAP environment variable.',
      ]);
    });
  });

  describe('reconcile action', () => {
    it('should answer, re-read, suspend and resume the release', async () => {
      gateway.getHelmRelease.mockResolvedValue(record('apps', 'web', [readyFalse()]));

      await expect(runCallback('toggle:apps:web')).resolves.toEqual({ status: 'ok' });

      expect(responder.answer).toHaveBeenCalledWith();
      expect(gateway.getHelmRelease).toHaveBeenCalledWith('apps', 'web');
      expect(gateway.patchHelmReleaseSuspend.mock.calls).toEqual([
        ['apps', 'web', true],
        ['apps', 'web', false],
      ]);
      expect(texts(responder.edit)).toEqual([
        'Suspending release apps/web...',
        'Unsuspending release apps/web...',
        '✅ Started reconciliation for apps/web\nUse /checkreleases to see current status',
      ]);
    });

    it('should leave a release alone that is already reconciling', async () => {
      gateway.getHelmRelease.mockResolvedValue(record('apps', 'web', [readyFalse(), reconcilingProgressing]));

      await expect(runCallback('toggle:apps:web')).resolves.toEqual({ status: 'ok' });

      expect(gateway.patchHelmReleaseSuspend).not.toHaveBeenCalled();
      expect(texts(responder.edit)).toEqual(['♻️ apps/web is already reconciling, no action taken.']);
    });

    it('should report a failed suspend', async () => {
      gateway.getHelmRelease.mockResolvedValue(record('apps', 'web', [readyFalse()]));
      gateway.patchHelmReleaseSuspend.mockRejectedValueOnce(new ClusterWriteError('suspend apps/web', new Error('forbidden')));

      const result = await runCallback('toggle:apps:web');

      expect(result.status).toBe('error');
      expect(texts(responder.edit)).toEqual([
        'Suspending release apps/web...',
        '❌ Failed to suspend release apps/web\nReason: forbidden',
      ]);
    });

    it('should give cleanup instructions when the resume fails', async () => {
      gateway.getHelmRelease.mockResolvedValue(record('apps', 'web', [readyFalse()]));
      gateway.patchHelmReleaseSuspend.mockResolvedValueOnce(undefined).mockRejectedValueOnce(new Error('timeout'));

      await runCallback('toggle:apps:web');

      expect(texts(responder.edit).pop()).toBe(
        '❌ Failed to unsuspend release apps/web\n' +
          'Reason: timeout\n' +
          '⚠️ The release is still suspended and needs manual cleanup:\n' +
          'flux resume helmrelease web -n apps',
      );
    });

    it('should report a release that cannot be read', async () => {
      gateway.getHelmRelease.mockRejectedValue(new Error('not found'));

      await runCallback('toggle:apps:gone');

      expect(gateway.patchHelmReleaseSuspend).not.toHaveBeenCalled();
      expect(texts(responder.edit)).toEqual(['❌ Error checking release apps/gone: not found']);
    });
  });

  describe('logs action', () => {
    it('should show the link of the chosen application', async () => {
      await runCallback('logs:api-worker');

      expect(responder.edit).toHaveBeenCalledWith({
        text: '📊 *api-worker Logs*\nhttps://logs.example.test/api\\_worker',
        markdown: true,
        disablePreview: true,
      });
    });

    it('should write a name with entity markers outside the bold title', async () => {
      logLinks = new LogLinkDirectory({ billing_api: 'https://logs.example.test/billing' });

      await runCallback('logs:billing_api');

      expect(texts(responder.edit)).toEqual(['📊 billing\\_api *Logs*\nhttps://logs.example.test/billing']);
    });

    it('should report an unknown application', async () => {
      await runCallback('logs:payments');
      expect(texts(responder.edit)).toEqual(['❌ No log link found for payments']);
    });
  });

  it('should report malformed action data', async () => {
    const result = await runCallback('toggle:apps');

    expect(result.status).toBe('error');
    expect(responder.answer).toHaveBeenCalledTimes(1);
    expect(texts(responder.edit)).toEqual(['❌ Error processing action: toggle expects a namespace and a name']);
  });

  it('should turn transport failures into an error result', async () => {
    responder.reply.mockRejectedValue(new Error('Too Many Requests'));

    const result = await runCommand('help');

    expect(result).toMatchObject({ status: 'error', error: { message: 'Too Many Requests' } });
  });
});
