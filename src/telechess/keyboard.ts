import type { Square } from 'chess.js';
import type { InlineKeyboardMarkup } from 'telegraf/types';

import { isSquare } from './GameSession';

const FILES = 'abcdefgh';
const PREFIX = 'square_';

// Zero-width non-joiner: Telegram rejects empty button labels
const BLANK = '\u200c';

export const SQUARE_CALLBACK = /^square_([a-h][1-8])$/;

/**
 * 8x8 grid of invisible buttons laid over the board picture, rank 8 on top.
 */
export function boardKeyboard(): InlineKeyboardMarkup {
  const inline_keyboard: InlineKeyboardMarkup['inline_keyboard'] = [];
  for (let rank = 8; rank >= 1; rank--) {
    const row: InlineKeyboardMarkup['inline_keyboard'][number] = [];
    for (const file of FILES) {
      row.push({ text: BLANK, callback_data: `${PREFIX}${file}${rank}` });
    }
    inline_keyboard.push(row);
  }
  return { inline_keyboard };
}

export function squareFromCallback(data: string): Square | null {
  const match = SQUARE_CALLBACK.exec(data);
  const square = match?.[1];
  return square && isSquare(square) ? square : null;
}
