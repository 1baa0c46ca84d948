import axios from 'axios';
import { Context, Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import rateLimit from 'telegraf-ratelimit';
import * as Sentry from '@sentry/node';

import type { Config } from './config';
import { langFrom, t } from './i18n';
import { log } from './log';
import { updatesTotal } from './metrics';
import {
  ChessChat,
  handleHelp,
  handleMove,
  handleMoves,
  handleNewGame,
  handleResign,
  handleSquareTap,
  handleStart,
  handleText,
  handleVoice,
  HandlerDeps
} from './telechess/commands';
import { SQUARE_CALLBACK } from './telechess/keyboard';

/**
 * Adapt a Telegraf update to the handlers' ChessChat port. Updates without
 * a sender or chat (channel posts, inline queries) yield null.
 */
export function chatFrom(ctx: Context): ChessChat | null {
  const from = ctx.from;
  const chat = ctx.chat;
  if (!from || !chat) return null;

  return {
    userId: from.id,
    chatId: chat.id,
    lang: langFrom(from.language_code),
    firstName: from.first_name,
    reply: async text => {
      await ctx.reply(text);
    },
    replyWithBoard: async (image, caption, keyboard) => {
      const sent = await ctx.replyWithPhoto({ source: image }, { caption, reply_markup: keyboard });
      return sent.message_id;
    },
    deleteMessage: async messageId => {
      await ctx.telegram.deleteMessage(chat.id, messageId);
    },
    answer: async text => {
      if (ctx.callbackQuery) await ctx.answerCbQuery(text);
    },
    downloadFile: async fileId => {
      const link = await ctx.telegram.getFileLink(fileId);
      const res = await axios.get<ArrayBuffer>(link.href, { responseType: 'arraybuffer' });
      return Buffer.from(res.data);
    }
  };
}

export function createBot(config: Config, deps: HandlerDeps): Telegraf {
  const bot = new Telegraf(config.telegram.token);

  // Timing and metrics for every update
  bot.use(async (ctx, next) => {
    const started = Date.now();
    await next();
    updatesTotal.inc({ type: ctx.updateType });
    log.info({ type: ctx.updateType, userId: ctx.from?.id, ms: Date.now() - started });
  });

  bot.use(rateLimit({
    window: 10000,
    limit: 5,
    keyGenerator: ctx => String(ctx.from?.id)
  }));

  const withChat = (fn: (chat: ChessChat) => Promise<void>) => async (ctx: Context) => {
    const chat = chatFrom(ctx);
    if (chat) await fn(chat);
  };

  bot.start(withChat(handleStart));
  bot.help(withChat(handleHelp));
  bot.command('newgame', withChat(chat => handleNewGame(chat, deps)));
  bot.command('move', ctx => withChat(chat => handleMove(chat, ctx.message.text, deps))(ctx));
  bot.command('moves', withChat(chat => handleMoves(chat, deps)));
  bot.command('resign', withChat(chat => handleResign(chat, deps)));

  bot.action(SQUARE_CALLBACK, ctx => withChat(chat => handleSquareTap(chat, ctx.match[0], deps))(ctx));

  bot.on(message('voice'), ctx => withChat(chat => handleVoice(chat, ctx.message.voice.file_id, deps))(ctx));
  bot.on(message('audio'), ctx => withChat(chat => handleVoice(chat, ctx.message.audio.file_id, deps))(ctx));
  bot.on(message('text'), ctx => withChat(chat => handleText(chat, ctx.message.text))(ctx));

  // Error handling
  bot.catch((err, ctx) => {
    log.error({ err, updateType: ctx.updateType, userId: ctx.from?.id }, 'Bot error');
    Sentry.captureException(err);
    const lang = langFrom(ctx.from?.language_code);
    if (ctx.callbackQuery) {
      ctx.answerCbQuery(t(lang, 'error')).catch(replyErr => log.warn({ err: replyErr }, 'Failed to answer after error'));
    } else if (ctx.chat) {
      ctx.reply(t(lang, 'error')).catch(replyErr => log.warn({ err: replyErr }, 'Failed to reply after error'));
    }
  });

  return bot;
}
