/**
 * Telegram Message Handlers
 */

import type { Bot } from 'grammy';
import type { Logger } from '@torrent-relay/utils';
import type { InboundEvent } from '../access.js';
import type { IngestionDispatcher } from '../dispatch.js';
import { replyFor } from '../replies.js';

/**
 * Structural subset of a grammy Message
 */
export interface IncomingMessage {
  from?: { id: number };
  text?: string;
  document?: {
    file_id: string;
    file_name?: string;
  };
}

/**
 * Structural subset of a grammy message context
 */
export interface MessageContext {
  update: { update_id: number };
  message: IncomingMessage & { message_id: number };
  reply(text: string, other: { reply_parameters: { message_id: number } }): Promise<unknown>;
}

export function toInboundEvent(message: IncomingMessage): InboundEvent {
  return {
    senderId: message.from?.id,
    text: message.text,
    document: message.document && {
      fileId: message.document.file_id,
      fileName: message.document.file_name,
    },
  };
}

/**
 * Each call is independent; the runner may have many in flight at once
 */
export function createMessageHandler(
  dispatcher: IngestionDispatcher,
  logger: Logger
): (ctx: MessageContext) => Promise<void> {
  return async (ctx) => {
    const outcome = await dispatcher.handle(toInboundEvent(ctx.message));
    logger.debug({ updateId: ctx.update.update_id, status: outcome.status }, 'Message handled');

    const text = replyFor(outcome);
    if (text) {
      await ctx.reply(text, {
        reply_parameters: { message_id: ctx.message.message_id },
      });
    }
  };
}

export function registerHandlers(
  bot: Bot,
  dispatcher: IngestionDispatcher,
  logger: Logger
): void {
  bot.on('message', createMessageHandler(dispatcher, logger));
}
