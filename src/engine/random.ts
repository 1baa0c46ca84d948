import { Chess } from 'chess.js';

import { EngineMoveOptions, MoveEngine } from './MoveEngine';

export class RandomEngine implements MoveEngine {
  readonly name = 'random';

  constructor(private readonly random: () => number = Math.random) {}

  async init(): Promise<void> {
    return;
  }

  async bestMove(fen: string, opts: EngineMoveOptions): Promise<string> {
    void opts;
    const moves = new Chess(fen).moves({ verbose: true });
    if (moves.length === 0) {
      return '0000';
    }
    const move = moves[Math.floor(this.random() * moves.length)];
    if (!move) {
      return '0000';
    }
    return `${move.from}${move.to}${move.promotion ?? ''}`;
  }

  async terminate(): Promise<void> {
    return;
  }
}
