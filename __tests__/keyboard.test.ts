import { boardKeyboard, squareFromCallback } from '../src/telechess/keyboard';
import { ensureHttps } from '../src/utils/ensureHttps';

const BLANK = '\u200c';

describe('boardKeyboard', () => {
  const { inline_keyboard: rows } = boardKeyboard();

  it('has one button per square, rank 8 first', () => {
    expect(rows).toHaveLength(8);
    expect(rows.every(row => row.length === 8)).toBe(true);
    expect(rows[0][0]).toEqual({ text: BLANK, callback_data: 'square_a8' });
    expect(rows[7][7]).toEqual({ text: BLANK, callback_data: 'square_h1' });
    expect(rows[6][4]).toEqual({ text: BLANK, callback_data: 'square_e2' });
  });
});

describe('squareFromCallback', () => {
  it.each([
    ['square_e4', 'e4'],
    ['square_h8', 'h8'],
    ['square_i9', null],
    ['square_e4x', null],
    ['move_e4', null]
  ])('%s -> %s', (data, square) => {
    expect(squareFromCallback(data)).toBe(square);
  });
});

describe('ensureHttps', () => {
  it.each([
    ['bot.example.test', 'https://bot.example.test'],
    ['bot.example.test/', 'https://bot.example.test'],
    ['http://bot.example.test//', 'http://bot.example.test'],
    ['https://bot.example.test', 'https://bot.example.test'],
    ['localhost:3000', 'http://localhost:3000'],
    [' 127.0.0.1:3000 ', 'http://127.0.0.1:3000']
  ])('%s -> %s', (input, expected) => {
    expect(ensureHttps(input)).toBe(expected);
  });
});
