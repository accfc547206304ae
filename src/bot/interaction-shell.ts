import { describeError } from '../common/errors';
import { ActionButton, CallbackRequest, ChatRequest, CommandRequest, HandlerResult } from '../common/interfaces/chat.interface';
import { ReleaseHealth, UnhealthyReleaseInfo } from '../common/interfaces/helmrelease.interface';
import { PodAppInfo } from '../common/interfaces/pod-app.interface';
import { encodeActionToken, decodeActionToken } from '../core/action-token';
import { AppStatusReporter } from '../core/app-status';
import { LogLinkDirectory } from '../core/log-links';
import { ReconciliationDriver } from '../core/reconciliation';
import { ReleaseHealthAggregator } from '../core/release-health';
import { splitIntoMessages } from '../utils/utils';
import {
  HELP_TEXT,
  START_TEXT,
  renderAppBlock,
  renderLogLink,
  renderLogLinks,
  renderReconcileOutcome,
  renderReconcileProgress,
  renderReleaseBlock,
} from './render';

export interface InteractionShellDependencies {
  releases: ReleaseHealthAggregator;
  reconciler: ReconciliationDriver;
  apps: AppStatusReporter;
  logLinks: LogLinkDirectory;
}

export const COMMANDS = ['start', 'help', 'checkreleases', 'apps', 'logs'] as const;

export type CommandName = (typeof COMMANDS)[number];

function isCommandName(command: string): command is CommandName {
  return COMMANDS.some((name) => name === command);
}

const OK: HandlerResult = { status: 'ok' };

function failed(error: unknown): HandlerResult {
  return { status: 'error', error: error instanceof Error ? error : new Error(String(error)) };
}

/**
 * Routes chat commands and button presses to the release and pod services and
 * renders their results. Knows nothing about Telegram beyond the message
 * format; the transport adapter supplies the responder.
 */
export class InteractionShell {
  constructor(private readonly deps: InteractionShellDependencies) {}

  async handle(request: ChatRequest): Promise<HandlerResult> {
    try {
      return request.kind === 'command' ? await this.handleCommand(request) : await this.handleCallback(request);
    } catch (error) {
      // Only transport failures get here; service errors are rendered in place
      console.error(`❌ Failed to handle ${request.kind} from ${request.userId}: ${describeError(error)}`);
      return failed(error);
    }
  }

  private async handleCommand(request: CommandRequest): Promise<HandlerResult> {
    if (!isCommandName(request.command)) {
      await request.responder.reply({ text: `Unknown command /${request.command}. Use /help to see available commands.` });
      return OK;
    }

    switch (request.command) {
      case 'start':
        await request.responder.reply({ text: START_TEXT });
        return OK;
      case 'help':
        await request.responder.reply({ text: HELP_TEXT });
        return OK;
      case 'checkreleases':
        return this.checkReleases(request);
      case 'apps':
        return this.listApps(request);
      case 'logs':
        return this.showLogLinks(request);
    }
  }

  private async checkReleases({ responder }: CommandRequest): Promise<HandlerResult> {
    let unhealthy: UnhealthyReleaseInfo[];
    try {
      unhealthy = await this.deps.releases.listUnhealthy();
    } catch (error) {
      await responder.reply({ text: `Error checking HelmReleases: ${describeError(error)}` });
      return failed(error);
    }

    if (unhealthy.length === 0) {
      await responder.reply({ text: 'All HelmReleases are healthy! 🎉' });
      return OK;
    }

    await responder.reply({ text: '⚠️ Found unhealthy HelmReleases:' });

    for (const release of unhealthy) {
      let text = renderReleaseBlock(release);
      const actions: ActionButton[][] = [];

      if (!release.isReconciling) {
        try {
          const token = encodeActionToken({ action: 'toggle', namespace: release.namespace, name: release.name });
          actions.push([{ label: '🔄 Reconcile', token }]);
        } catch (error) {
          console.warn(`⚠️ No reconcile button for ${release.namespace}/${release.name}: ${describeError(error)}`);
          text += '\n_Reconcile button unavailable: release name too long_';
        }
      }

      await responder.reply({ text, markdown: true, actions: actions.length > 0 ? actions : undefined });
    }

    return OK;
  }

  private async listApps({ responder }: CommandRequest): Promise<HandlerResult> {
    let apps: PodAppInfo[];
    try {
      apps = await this.deps.apps.listApps();
    } catch (error) {
      await responder.reply({ text: `Error searching pods: ${describeError(error)}` });
      return failed(error);
    }

    if (apps.length === 0) {
      await responder.reply({ text: `No pods found with label ${this.deps.apps.labelSelector}` });
      return OK;
    }

    for (const message of splitIntoMessages(apps.map(renderAppBlock))) {
      await responder.reply({ text: message.trimEnd() });
    }
    return OK;
  }

  private async showLogLinks({ responder, args }: CommandRequest): Promise<HandlerResult> {
    const { logLinks } = this.deps;

    if (logLinks.isEmpty()) {
      await responder.reply({
        text: 'No application log links are configured. Set the APP_LOGS_MAP environment variable.',
      });
      return OK;
    }

    const filter = args[0]?.toLowerCase();
    const links = logLinks.find(filter);

    if (filter && links.length === 0) {
      await responder.reply({ text: `No log links found for application matching '${filter}'` });
      return OK;
    }

    const actions: ActionButton[][] = [];
    if (!filter) {
      for (const link of links) {
        try {
          actions.push([{ label: `📊 ${link.appName}`, token: encodeActionToken({ action: 'logs', appName: link.appName }) }]);
        } catch (error) {
          console.warn(`⚠️ No log button for ${link.appName}: ${describeError(error)}`);
        }
      }
    }

    await responder.reply({
      text: renderLogLinks(links, Boolean(filter)),
      markdown: true,
      disablePreview: true,
      actions: actions.length > 0 ? actions : undefined,
    });
    return OK;
  }

  private async handleCallback({ data, responder }: CallbackRequest): Promise<HandlerResult> {
    await responder.answer();

    const outcome = decodeActionToken(data);
    if (!outcome.decoded) {
      console.warn(`⚠️ Rejected callback data '${data}': ${outcome.error.detail}`);
      await responder.edit({ text: `❌ Error processing action: ${outcome.error.detail}` });
      return failed(outcome.error);
    }

    const { token } = outcome;
    if (token.action === 'logs') {
      const link = this.deps.logLinks.get(token.appName);
      if (!link) {
        await responder.edit({ text: `❌ No log link found for ${token.appName}` });
        return OK;
      }
      await responder.edit({ text: renderLogLink(link), markdown: true, disablePreview: true });
      return OK;
    }

    const { namespace, name } = token;
    const release = `${namespace}/${name}`;

    let health: ReleaseHealth;
    try {
      health = await this.deps.releases.describe(namespace, name);
    } catch (error) {
      await responder.edit({ text: `❌ Error checking release ${release}: ${describeError(error)}` });
      return failed(error);
    }

    const result = await this.deps.reconciler.reconcile(namespace, name, {
      reconciling: health.verdict.reconciling,
      onProgress: (step) => responder.edit({ text: renderReconcileProgress(step, release) }),
    });

    await responder.edit({ text: renderReconcileOutcome(namespace, name, result) });

    if (result.error && result.error.kind !== 'AlreadyReconciling') {
      return failed(result.error);
    }
    return OK;
  }
}
