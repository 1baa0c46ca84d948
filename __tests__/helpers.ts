import type { InlineKeyboardMarkup } from 'telegraf/types';

import type { EngineMoveOptions, MoveEngine } from '../src/engine/MoveEngine';
import type { Lang } from '../src/i18n';
import type { ChessChat } from '../src/telechess/commands';

export const START_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

export const boardPart = (fen: string) => fen.split(' ')[0];

/** Engine that plays a fixed list of replies, then "0000". */
export class ScriptedEngine implements MoveEngine {
  readonly name = 'scripted';
  readonly bestMove = jest.fn(async (_fen: string, _opts: EngineMoveOptions) => this.replies.shift() ?? '0000');
  readonly terminate = jest.fn(async () => undefined);

  constructor(private readonly replies: string[] = []) {}

  async init(): Promise<void> {
    return;
  }
}

export interface SentBoard {
  image: Buffer;
  caption: string;
  keyboard?: InlineKeyboardMarkup;
  messageId: number;
}

export class FakeChat implements ChessChat {
  readonly chatId = 100;
  readonly lang: Lang = 'en';
  readonly firstName = 'Ada';
  readonly replies: string[] = [];
  readonly answers: Array<string | undefined> = [];
  readonly boards: SentBoard[] = [];
  readonly deleted: number[] = [];
  readonly downloadFile = jest.fn(async (_fileId: string) => Buffer.from('ogg-bytes'));
  private nextId = 1;

  constructor(readonly userId = 1) {}

  async reply(text: string): Promise<void> {
    this.replies.push(text);
  }

  async replyWithBoard(image: Buffer, caption: string, keyboard?: InlineKeyboardMarkup): Promise<number> {
    const messageId = this.nextId++;
    this.boards.push({ image, caption, keyboard, messageId });
    return messageId;
  }

  async deleteMessage(messageId: number): Promise<void> {
    this.deleted.push(messageId);
  }

  async answer(text?: string): Promise<void> {
    this.answers.push(text);
  }
}

/** Minimal mono 16-bit WAV around the given samples. */
export function makeWav(samples: number[], extraChunk?: { id: string; data: Buffer }): Buffer {
  const data = Buffer.alloc(samples.length * 2);
  samples.forEach((s, i) => data.writeInt16LE(s, i * 2));

  const fmt = Buffer.alloc(24);
  fmt.write('fmt ', 0, 'ascii');
  fmt.writeUInt32LE(16, 4);
  fmt.writeUInt16LE(1, 8); // PCM
  fmt.writeUInt16LE(1, 10); // mono
  fmt.writeUInt32LE(16000, 12);
  fmt.writeUInt32LE(32000, 16);
  fmt.writeUInt16LE(2, 20);
  fmt.writeUInt16LE(16, 22);

  const chunks: Buffer[] = [fmt];
  if (extraChunk) {
    const header = Buffer.alloc(8);
    header.write(extraChunk.id, 0, 'ascii');
    header.writeUInt32LE(extraChunk.data.length, 4);
    const pad = extraChunk.data.length % 2 ? Buffer.alloc(1) : Buffer.alloc(0);
    chunks.push(header, extraChunk.data, pad);
  }
  const dataHeader = Buffer.alloc(8);
  dataHeader.write('data', 0, 'ascii');
  dataHeader.writeUInt32LE(data.length, 4);
  chunks.push(dataHeader, data);

  const body = Buffer.concat(chunks);
  const riff = Buffer.alloc(12);
  riff.write('RIFF', 0, 'ascii');
  riff.writeUInt32LE(body.length + 4, 4);
  riff.write('WAVE', 8, 'ascii');
  return Buffer.concat([riff, body]);
}
