import chalk from 'chalk';

import {
  ONE_DAY_IN_MILLISECONDS,
  ONE_HOUR_IN_MILLISECONDS,
  ONE_MINUTE_IN_MILLISECONDS,
} from '../common/time.constants';

/** Telegram refuses messages longer than this */
export const MAX_MESSAGE_LENGTH = 4096;

/**
 * Renders the age of a resource at its coarsest unit: days, else hours, else
 * minutes. Units are never combined and seconds are never shown.
 *
 * @param creationTimestamp - metadata.creationTimestamp of the resource
 * @param now - reference point, defaults to the current time
 */
export function calculateAge(creationTimestamp: Date | string | undefined, now: Date = new Date()): string {
  if (!creationTimestamp) return 'Unknown';

  const created = creationTimestamp instanceof Date ? creationTimestamp : new Date(creationTimestamp);
  if (Number.isNaN(created.getTime())) return 'Unknown';

  const ageMs = Math.max(0, now.getTime() - created.getTime());

  const days = Math.floor(ageMs / ONE_DAY_IN_MILLISECONDS);
  if (days > 0) return `${days}d`;

  const hours = Math.floor(ageMs / ONE_HOUR_IN_MILLISECONDS);
  if (hours > 0) return `${hours}h`;

  return `${Math.floor(ageMs / ONE_MINUTE_IN_MILLISECONDS)}m`;
}

/**
 * Version part of an image tag: everything before the first hyphen
 * (`1.9.0-rc1` -> `1.9.0`). Not semver-aware.
 */
export function extractVersion(tag: string): string {
  return tag.split('-')[0];
}

/**
 * Tag of an image reference: whatever follows the last colon, `latest` when
 * there is none.
 */
export function extractImageTag(image: string | undefined): string {
  if (!image || !image.includes(':')) return 'latest';
  return image.slice(image.lastIndexOf(':') + 1);
}

/**
 * Escapes the characters Telegram's legacy Markdown treats as entity markers
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

export function hasMarkdownMarkers(text: string): boolean {
  return /[_*`[]/.test(text);
}

/**
 * Inline code span for legacy Markdown. Backticks cannot be escaped inside
 * an entity, so they are swapped for single quotes.
 */
export function toInlineCode(text: string): string {
  return `\`${text.replace(/`/g, "'")}\``;
}

/**
 * Packs text blocks into as few messages as possible without splitting a block.
 * A single block longer than the limit is hard-wrapped.
 */
export function splitIntoMessages(blocks: string[], limit = MAX_MESSAGE_LENGTH): string[] {
  const messages: string[] = [];
  let current = '';

  for (const block of blocks) {
    if (current.length + block.length <= limit) {
      current += block;
      continue;
    }

    if (current) messages.push(current);
    current = '';

    let rest = block;
    while (rest.length > limit) {
      messages.push(rest.slice(0, limit));
      rest = rest.slice(limit);
    }
    current = rest;
  }

  if (current) messages.push(current);
  return messages;
}

export function printErrorAndExit(message: string, exitCode = 1): never {
  console.error(`\n ${chalk.red('❌ Error:')} ${message}`);
  process.exit(exitCode);
}

export interface Stoppable {
  name: string;
  stop(): Promise<void> | void;
}

export async function gracefulShutdown(signal: string, services: Stoppable[]): Promise<void> {
  console.log(`📡 Received ${signal}, initiating graceful shutdown...`);
  try {
    for (const service of services) {
      await service.stop();
      console.log(`🛑 Stopped ${service.name}`);
    }
    process.exit(0);
  } catch (error) {
    printErrorAndExit(`❌ Error during shutdown: ${error}`, 1);
  }
}
