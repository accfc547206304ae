import { ReconcileOutcome, ReconcileStep } from '../core/reconciliation';
import { ReleaseStatusCategory, UnhealthyReleaseInfo } from '../common/interfaces/helmrelease.interface';
import { PodAppInfo, PodStatusCategory } from '../common/interfaces/pod-app.interface';
import { LogLink } from '../core/log-links';
import { escapeMarkdown, hasMarkdownMarkers, toInlineCode } from '../utils/utils';

export const HELP_TEXT = [
  'Available commands:',
  '/checkreleases - List unhealthy Flux HelmReleases and manage them',
  '/apps - List apps status',
  '/logs [app] - Show log links for applications (optional: filter by app name)',
].join('\n');

export const START_TEXT = 'Hello! I am a Kubernetes-aware Telegram bot. Use /help to see available commands.';

const RELEASE_EMOJI: Record<Exclude<ReleaseStatusCategory, 'healthy'>, string> = {
  reconciling: '♻️',
  stalled: '⛔️',
  'not-ready': '🔄',
};

const RELEASE_LABEL: Record<Exclude<ReleaseStatusCategory, 'healthy'>, string> = {
  reconciling: 'RECONCILING',
  stalled: 'STALLED',
  'not-ready': 'NOT READY',
};

const POD_EMOJI: Record<PodStatusCategory, string> = {
  running: '🟢',
  failed: '🔴',
  other: '🟡',
};

/**
 * Markdown block for one unhealthy release
 */
export function renderReleaseBlock(release: UnhealthyReleaseInfo): string {
  const category = release.category === 'healthy' ? 'not-ready' : release.category;
  return [
    `${RELEASE_EMOJI[category]} *${release.namespace}/${release.name}*`,
    `├─ Status: ${RELEASE_LABEL[category]}`,
    `├─ Last Transition: ${escapeMarkdown(release.lastTransitionTime)}`,
    `└─ Error: ${toInlineCode(release.errorMessage)}`,
  ].join('\n');
}

/**
 * Plain-text block for one application pod, followed by a blank line
 */
export function renderAppBlock(app: PodAppInfo): string {
  return (
    `${POD_EMOJI[app.statusCategory]} ${app.namespace}/${app.podName}\n` +
    `   Status: ${app.phase}\n` +
    `   Image tag: ${app.imageTag}\n` +
    `   Version: ${app.version}\n` +
    `   Age: ${app.ageDisplay}\n\n`
  );
}

/**
 * Legacy Markdown cannot escape inside an entity, so a name carrying an entity
 * marker is written escaped next to the link instead of as its text.
 */
function renderLogLinkLine(bullet: string, link: LogLink): string {
  if (hasMarkdownMarkers(link.appName)) {
    return `${bullet} ${escapeMarkdown(link.appName)}: [logs](${link.url})`;
  }
  return `${bullet} [${link.appName}](${link.url})`;
}

export function renderLogLinks(links: LogLink[], filtered: boolean): string {
  const bullet = filtered ? '🔍' : '📊';
  return links.reduce((text, link) => `${text}${renderLogLinkLine(bullet, link)}\n\n`, '📋 Application Log Links:\n\n');
}

export function renderLogLink(link: LogLink): string {
  const title = hasMarkdownMarkers(link.appName)
    ? `${escapeMarkdown(link.appName)} *Logs*`
    : `*${link.appName} Logs*`;
  return `📊 ${title}\n${escapeMarkdown(link.url)}`;
}

export function renderReconcileProgress(step: ReconcileStep, release: string): string {
  return step === 'suspending' ? `Suspending release ${release}...` : `Unsuspending release ${release}...`;
}

/**
 * Final state of a reconcile request. Plain text: error details come straight
 * from the API server and are not escaped.
 */
export function renderReconcileOutcome(namespace: string, name: string, outcome: ReconcileOutcome): string {
  const release = `${namespace}/${name}`;
  const { error } = outcome;

  if (!error) {
    return `✅ Started reconciliation for ${release}\nUse /checkreleases to see current status`;
  }

  switch (error.kind) {
    case 'AlreadyReconciling':
      return `♻️ ${release} is already reconciling, no action taken.`;
    case 'SuspendFailed':
      return `❌ Failed to suspend release ${release}\nReason: ${error.detail}`;
    case 'UnsuspendFailed':
      return [
        `❌ Failed to unsuspend release ${release}`,
        `Reason: ${error.detail}`,
        '⚠️ The release is still suspended and needs manual cleanup:',
        `flux resume helmrelease ${name} -n ${namespace}`,
      ].join('\n');
  }
}
