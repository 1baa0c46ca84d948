import type { InlineKeyboardMarkup } from 'telegraf/types';

import { Lang, t } from '../i18n';
import { log } from '../log';
import { activeGames, movesTotal, voiceTotal } from '../metrics';
import { BoardRenderer } from '../render/boardImage';
import { SessionStore } from '../store/sessions';
import { MoveOutcome, PlayedMoves } from '../types';
import { withLock } from '../utils/lock';
import { VoiceTranscriber } from '../voice/pipeline';
import { transcriptToMove } from '../voice/transcript';
import { GameSession } from './GameSession';
import { boardKeyboard, squareFromCallback } from './keyboard';

/**
 * What the handlers need from the chat platform. The Telegraf adapter in
 * bot.ts implements it for real updates.
 */
export interface ChessChat {
  readonly userId: number;
  readonly chatId: number;
  readonly lang: Lang;
  readonly firstName?: string;
  reply(text: string): Promise<void>;
  /** Send a board picture; resolves to the new message id */
  replyWithBoard(image: Buffer, caption: string, keyboard?: InlineKeyboardMarkup): Promise<number>;
  deleteMessage(messageId: number): Promise<void>;
  /** Answer the callback query behind a keyboard tap */
  answer(text?: string): Promise<void>;
  downloadFile(fileId: string): Promise<Buffer>;
}

export interface HandlerDeps {
  sessions: SessionStore;
  renderer: BoardRenderer;
  voice: VoiceTranscriber;
}

type MoveSource = 'command' | 'tap' | 'voice';

// One handler invocation per user at a time
function forUser<T>(chat: ChessChat, fn: () => Promise<T>): Promise<T> {
  return withLock(`user:${chat.userId}`, fn);
}

export function commandArgs(text: string): string[] {
  return text.trim().split(/\s+/).slice(1);
}

function statusText(lang: Lang, session: GameSession): string {
  const status = session.status();
  if (status.key === 'checkmate') {
    return t(lang, 'status.checkmate', { winner: t(lang, status.winner === 'w' ? 'white' : 'black') });
  }
  return t(lang, `status.${status.key}`);
}

function moveCaption(lang: Lang, session: GameSession, moves: PlayedMoves, heard?: string): string {
  const lines: string[] = [];
  if (heard) {
    lines.push(t(lang, 'heard', { text: heard }), '');
  }
  lines.push(t(lang, 'lastMoves', { move: moves.userMove }));
  if (moves.engineMove) {
    lines.push(t(lang, 'engineMove', { move: moves.engineMove }));
  }
  lines.push('', statusText(lang, session));
  return lines.join('\n');
}

/**
 * Send the current position as a new board message and delete the one it
 * replaces. Returns false when the picture could not be produced.
 */
async function publishBoard(chat: ChessChat, deps: HandlerDeps, session: GameSession, caption: string): Promise<boolean> {
  const image = await deps.renderer.render(session.fen());
  if (image.status !== 'ok') {
    await chat.reply(t(chat.lang, 'rendererUnavailable'));
    return false;
  }

  const previous = session.lastMessageId;
  const keyboard = session.isGameOver() ? undefined : boardKeyboard();
  session.lastMessageId = await chat.replyWithBoard(image.value, caption, keyboard);

  if (previous !== undefined) {
    await deleteBoard(chat, previous);
  }
  return true;
}

async function deleteBoard(chat: ChessChat, messageId: number): Promise<void> {
  await chat.deleteMessage(messageId).catch(err =>
    log.warn({ err, userId: chat.userId, messageId }, 'Failed to delete previous board')
  );
}

async function playMove(
  chat: ChessChat,
  deps: HandlerDeps,
  session: GameSession,
  token: string,
  source: MoveSource,
  heard?: string
): Promise<MoveOutcome> {
  const outcome = await session.attemptMove(token);
  movesTotal.inc({ source, result: outcome.status });
  if (outcome.status !== 'ok') {
    return outcome;
  }

  log.info(
    { userId: chat.userId, source, user: outcome.value.userMove, engine: outcome.value.engineMove },
    'Move played'
  );
  try {
    await publishBoard(chat, deps, session, moveCaption(chat.lang, session, outcome.value, heard));
  } finally {
    if (outcome.value.gameOver) {
      log.info({ userId: chat.userId, status: session.status().key }, 'Game over');
      await deps.sessions.remove(chat.userId);
      activeGames.set(deps.sessions.size);
    }
  }
  return outcome;
}

export async function handleStart(chat: ChessChat): Promise<void> {
  await chat.reply(t(chat.lang, 'welcome', { name: chat.firstName ?? '' }));
}

export async function handleHelp(chat: ChessChat): Promise<void> {
  await chat.reply(t(chat.lang, 'help'));
}

// /newgame command handler
export function handleNewGame(chat: ChessChat, deps: HandlerDeps): Promise<void> {
  return forUser(chat, async () => {
    const previousBoard = deps.sessions.get(chat.userId)?.lastMessageId;
    const session = await deps.sessions.create(chat.userId);
    activeGames.set(deps.sessions.size);
    log.info({ userId: chat.userId, engine: session.engineName }, 'New game');
    await publishBoard(chat, deps, session, t(chat.lang, 'newGame'));
    // the old game's board goes away with it
    if (previousBoard !== undefined) {
      await deleteBoard(chat, previousBoard);
    }
  });
}

// /move command handler
export function handleMove(chat: ChessChat, text: string, deps: HandlerDeps): Promise<void> {
  return forUser(chat, async () => {
    const session = deps.sessions.get(chat.userId);
    if (!session) {
      await chat.reply(t(chat.lang, 'noGame'));
      return;
    }
    const [token] = commandArgs(text);
    if (!token) {
      await chat.reply(t(chat.lang, 'moveUsage'));
      return;
    }

    const outcome = await playMove(chat, deps, session, token, 'command');
    if (outcome.status === 'invalid') {
      await chat.reply(t(chat.lang, outcome.reason === 'game-over' ? 'gameAlreadyOver' : 'invalidMove'));
    }
  });
}

export function handleMoves(chat: ChessChat, deps: HandlerDeps): Promise<void> {
  return forUser(chat, async () => {
    const session = deps.sessions.get(chat.userId);
    if (!session) {
      await chat.reply(t(chat.lang, 'noGame'));
      return;
    }
    const lines = session.moveHistory();
    const moves = lines.length ? lines.join('\n') : t(chat.lang, 'noMoves');
    await chat.reply(t(chat.lang, 'movesList', { moves }));
  });
}

// /resign command handler
export function handleResign(chat: ChessChat, deps: HandlerDeps): Promise<void> {
  return forUser(chat, async () => {
    if (!deps.sessions.get(chat.userId)) {
      await chat.reply(t(chat.lang, 'noGame'));
      return;
    }
    await deps.sessions.remove(chat.userId);
    activeGames.set(deps.sessions.size);
    log.info({ userId: chat.userId }, 'User resigned');
    await chat.reply(t(chat.lang, 'resigned'));
  });
}

/**
 * Board tap. The first tap picks up one of the user's pieces, a tap on the
 * same square puts it back, a tap elsewhere tries the move.
 */
export function handleSquareTap(chat: ChessChat, data: string, deps: HandlerDeps): Promise<void> {
  return forUser(chat, async () => {
    const square = squareFromCallback(data);
    if (!square) {
      await chat.answer();
      return;
    }
    const session = deps.sessions.get(chat.userId);
    if (!session) {
      await chat.answer(t(chat.lang, 'noGame'));
      return;
    }

    const from = session.selectedSquare;
    if (!from) {
      const selected = session.select(square);
      await chat.answer(t(chat.lang, selected ? 'selected' : 'noPiece', { square }));
      return;
    }
    if (from === square) {
      session.clearSelection();
      await chat.answer(t(chat.lang, 'selectionCancelled'));
      return;
    }

    const outcome = await playMove(chat, deps, session, `${from}${square}`, 'tap');
    if (outcome.status === 'invalid') {
      await chat.answer(t(chat.lang, outcome.reason === 'game-over' ? 'gameAlreadyOver' : 'cannotMove'));
      return;
    }
    await chat.answer();
  });
}

/**
 * Voice or audio message: download, transcribe, turn the words into a move
 * and play it like /move.
 */
export function handleVoice(chat: ChessChat, fileId: string | undefined, deps: HandlerDeps): Promise<void> {
  return forUser(chat, async () => {
    const session = deps.sessions.get(chat.userId);
    if (!session) {
      await chat.reply(t(chat.lang, 'noGame'));
      return;
    }
    if (!fileId) {
      await chat.reply(t(chat.lang, 'noVoice'));
      return;
    }

    let audio: Buffer;
    try {
      audio = await chat.downloadFile(fileId);
    } catch (err) {
      log.error({ err, userId: chat.userId, fileId }, 'Voice download failed');
      voiceTotal.inc({ outcome: 'download-failed' });
      await chat.reply(t(chat.lang, 'downloadFailed'));
      return;
    }

    const transcript = await deps.voice.transcribe(audio);
    if (transcript.status === 'invalid') {
      voiceTotal.inc({ outcome: 'not-understood' });
      await chat.reply(t(chat.lang, 'speechNotUnderstood'));
      return;
    }
    if (transcript.status === 'unavailable') {
      voiceTotal.inc({ outcome: `${transcript.service}-unavailable` });
      const key = transcript.service === 'transcoder' ? 'transcoderUnavailable' : 'speechUnavailable';
      await chat.reply(t(chat.lang, key));
      return;
    }

    const heard = transcript.value.text;
    const token = transcriptToMove(heard);
    log.debug({ userId: chat.userId, heard, token }, 'Voice move');
    if (!token) {
      voiceTotal.inc({ outcome: 'no-move' });
      await chat.reply(t(chat.lang, 'voiceNoMove', { text: heard }));
      return;
    }

    const outcome = await playMove(chat, deps, session, token, 'voice', heard);
    voiceTotal.inc({ outcome: outcome.status === 'ok' ? 'played' : 'invalid-move' });
    if (outcome.status === 'invalid') {
      await chat.reply(t(chat.lang, 'voiceInvalidMove', { text: heard }));
    }
  });
}

// Plain text that is not a command
export async function handleText(chat: ChessChat, text: string): Promise<void> {
  if (text.trim().startsWith('/')) return;
  const lower = text.toLowerCase();
  const key = lower.includes('satranç') || lower.includes('chess') ? 'chessHint' : 'helpHint';
  await chat.reply(t(chat.lang, key));
}
