import chalk from 'chalk';
import { Context, Markup, Telegraf } from 'telegraf';

import { describeError } from '../common/errors';
import { ChatHandler, ChatResponder, OutgoingMessage } from '../common/interfaces/chat.interface';
import { printErrorAndExit } from '../utils/utils';

function messageOptions(message: OutgoingMessage) {
  return {
    parse_mode: message.markdown ? ('Markdown' as const) : undefined,
    link_preview_options: message.disablePreview ? { is_disabled: true } : undefined,
    reply_markup: message.actions
      ? Markup.inlineKeyboard(
          message.actions.map((row) => row.map((button) => Markup.button.callback(button.label, button.token))),
        ).reply_markup
      : undefined,
  };
}

/**
 * Responder for a slash command. There is no originating bot message to
 * edit, so edits are sent as new replies.
 */
export function commandResponder(ctx: Context): ChatResponder {
  const reply = async (message: OutgoingMessage) => {
    await ctx.reply(message.text, messageOptions(message));
  };
  return {
    reply,
    edit: reply,
    answer: async () => undefined,
  };
}

export function callbackResponder(ctx: Context): ChatResponder {
  return {
    reply: async (message) => {
      await ctx.reply(message.text, messageOptions(message));
    },
    edit: async (message) => {
      await ctx.editMessageText(message.text, messageOptions(message));
    },
    answer: async (text) => {
      await ctx.answerCbQuery(text);
    },
  };
}

interface CommandEntity {
  type: string;
  offset: number;
  length: number;
}

export interface ParsedCommand {
  command: string;
  args: string[];
}

/**
 * Command name and arguments of a message starting with a bot command.
 * Commands addressed to another bot (`/help@other_bot`) are not ours.
 */
export function parseCommand(
  text: string,
  entities: readonly CommandEntity[] | undefined,
  botUsername: string | undefined,
): ParsedCommand | undefined {
  const entity = entities?.find((e) => e.type === 'bot_command' && e.offset === 0);
  if (!entity) return undefined;

  const [command, mention] = text.slice(1, entity.length).split('@');
  if (mention && mention.toLowerCase() !== botUsername?.toLowerCase()) return undefined;

  return { command, args: text.slice(entity.length).split(/\s+/).filter(Boolean) };
}

export interface TelegramTransportOptions {
  token: string;
  commands: readonly string[];
  handler: ChatHandler;
}

/**
 * Long-polling Telegram bot that feeds commands and button presses into the
 * chat pipeline.
 */
export class TelegramTransport {
  private running = false;

  constructor(
    private readonly options: TelegramTransportOptions,
    private readonly bot: Telegraf = new Telegraf(options.token),
  ) {
    this.registerHandlers();
  }

  private registerHandlers(): void {
    const { handler } = this.options;

    for (const command of this.options.commands) {
      this.bot.command(command, async (ctx) => {
        const userId = ctx.from?.id;
        if (userId === undefined) return;
        await handler({ kind: 'command', userId, command, args: ctx.args, responder: commandResponder(ctx) });
      });
    }

    // Anything else that looks like a command still reaches the shell
    this.bot.on('message', async (ctx) => {
      if (!('text' in ctx.message)) return;
      const parsed = parseCommand(ctx.message.text, ctx.message.entities, ctx.me);
      const userId = ctx.from?.id;
      if (!parsed || userId === undefined) return;
      await handler({ kind: 'command', userId, ...parsed, responder: commandResponder(ctx) });
    });

    this.bot.on('callback_query', async (ctx) => {
      const data = 'data' in ctx.callbackQuery ? ctx.callbackQuery.data : '';
      await handler({ kind: 'callback', userId: ctx.callbackQuery.from.id, data, responder: callbackResponder(ctx) });
    });

    this.bot.catch((error, ctx) => {
      console.error(`❌ Telegram update ${ctx.update.update_id} failed: ${describeError(error)}`);
    });
  }

  /**
   * Resolves once polling has started. A failure before that rejects; polling
   * that dies later is fatal.
   */
  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.bot
        .launch(() => {
          this.running = true;
          console.log(`🤖 ${chalk.green('Telegram bot started')} (long polling)`);
          resolve();
        })
        .catch((error: unknown) => {
          if (!this.running) {
            console.error(`❌ Telegram bot failed to start: ${describeError(error)}`);
            reject(error);
            return;
          }
          this.running = false;
          printErrorAndExit(`💥 Telegram polling stopped: ${describeError(error)}`, 1);
        });
    });
  }

  stop(signal = 'shutdown'): void {
    if (!this.running) return;
    this.running = false;
    this.bot.stop(signal);
  }
}
