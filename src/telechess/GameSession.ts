import { Chess, Move, Square } from 'chess.js';

import { MoveEngine } from '../engine/MoveEngine';
import { log } from '../log';
import { Color, invalid, MoveOutcome, ok } from '../types';

const COORDINATE_MOVE = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;

export type SessionStatus =
  | { key: 'checkmate'; winner: Color }
  | { key: 'stalemate' }
  | { key: 'insufficientMaterial' }
  | { key: 'draw' }
  | { key: 'check' }
  | { key: 'yourTurn' }
  | { key: 'engineTurn' };

export interface GameSessionOptions {
  moveTimeMs: number;
  /** Starting position; the standard one when omitted */
  fen?: string;
  random?: () => number;
}

export function isSquare(value: string): value is Square {
  return /^[a-h][1-8]$/.test(value);
}

/**
 * One user's game against the engine. The user always plays white and moves
 * first; the engine answers every accepted move.
 */
export class GameSession {
  private readonly chess: Chess;
  public readonly userId: number;
  public readonly userColor: Color = 'w';
  public readonly createdAt: Date;
  public lastMoveAt?: Date;
  /** Board message currently shown to the user, replaced on every update */
  public lastMessageId?: number;
  private selected?: Square;
  private disposed = false;

  constructor(
    userId: number,
    private readonly engine: MoveEngine,
    private readonly opts: GameSessionOptions
  ) {
    this.chess = opts.fen ? new Chess(opts.fen) : new Chess();
    this.userId = userId;
    this.createdAt = new Date();
  }

  public get engineName(): string {
    return this.engine.name;
  }

  public get selectedSquare(): Square | undefined {
    return this.selected;
  }

  public fen(): string {
    return this.chess.fen();
  }

  public isGameOver(): boolean {
    return this.chess.isGameOver();
  }

  public ownsPieceAt(square: Square): boolean {
    const piece = this.chess.get(square);
    return piece ? piece.color === this.userColor : false;
  }

  /**
   * Remember `square` as the source of a two-tap move. Only squares holding
   * one of the user's pieces can be selected.
   */
  public select(square: Square): boolean {
    if (!this.ownsPieceAt(square)) {
      this.selected = undefined;
      return false;
    }
    this.selected = square;
    return true;
  }

  public clearSelection(): void {
    this.selected = undefined;
  }

  /**
   * Play the user's move, then the engine's reply. The token may be SAN
   * ("Nf3", "O-O") or coordinates ("e2e4", "e7e8q").
   */
  public async attemptMove(token: string): Promise<MoveOutcome> {
    this.selected = undefined;

    if (this.chess.isGameOver()) {
      return invalid('game-over');
    }
    if (this.chess.turn() !== this.userColor) {
      return invalid('illegal-move');
    }

    const userMove = this.tryMove(token);
    if (!userMove) {
      log.debug({ userId: this.userId, token }, 'Rejected move');
      return invalid('illegal-move');
    }
    this.lastMoveAt = new Date();

    if (this.chess.isGameOver()) {
      return ok({ userMove: userMove.san, gameOver: true });
    }

    const reply = await this.engineReply();
    return ok({
      userMove: userMove.san,
      engineMove: reply.san,
      gameOver: this.chess.isGameOver()
    });
  }

  public status(): SessionStatus {
    if (this.chess.isCheckmate()) {
      return { key: 'checkmate', winner: this.chess.turn() === 'w' ? 'b' : 'w' };
    }
    if (this.chess.isStalemate()) return { key: 'stalemate' };
    if (this.chess.isInsufficientMaterial()) return { key: 'insufficientMaterial' };
    if (this.chess.isDraw()) return { key: 'draw' };
    if (this.chess.inCheck()) return { key: 'check' };
    return this.chess.turn() === this.userColor ? { key: 'yourTurn' } : { key: 'engineTurn' };
  }

  /**
   * Numbered SAN list, one full move per line
   */
  public moveHistory(): string[] {
    const history = this.chess.history();
    const lines: string[] = [];
    for (let i = 0; i < history.length; i += 2) {
      const moveNum = Math.floor(i / 2) + 1;
      const black = history[i + 1];
      lines.push(black ? `${moveNum}. ${history[i]} ${black}` : `${moveNum}. ${history[i]}`);
    }
    return lines;
  }

  /** Release the engine. Safe to call more than once. */
  public async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await this.engine.terminate();
  }

  private tryMove(token: string): Move | null {
    const text = token.trim();
    const coords = COORDINATE_MOVE.exec(text.toLowerCase());
    try {
      if (coords) {
        const [, from, to, promotion] = coords;
        return this.chess.move({ from, to, promotion: promotion ?? this.defaultPromotion(from, to) });
      }
      return this.chess.move(text);
    } catch {
      // chess.js throws on unparsable or illegal moves
      return null;
    }
  }

  private defaultPromotion(from: string, to: string): string | undefined {
    if (!isSquare(from)) return undefined;
    const piece = this.chess.get(from);
    const lastRank = to[1] === '8' || to[1] === '1';
    return piece && piece.type === 'p' && lastRank ? 'q' : undefined;
  }

  private async engineReply(): Promise<Move> {
    let suggestion: string | undefined;
    try {
      suggestion = await this.engine.bestMove(this.chess.fen(), { timeMs: this.opts.moveTimeMs });
    } catch (err) {
      log.error({ err, engine: this.engine.name, userId: this.userId }, 'Engine failed to reply');
    }

    const played = suggestion ? this.tryMove(suggestion) : null;
    if (played) {
      return played;
    }
    if (suggestion) {
      log.warn({ suggestion, fen: this.chess.fen() }, 'Engine suggested an unplayable move');
    }
    return this.randomMove();
  }

  private randomMove(): Move {
    const moves = this.chess.moves();
    const random = this.opts.random ?? Math.random;
    const san = moves[Math.floor(random() * moves.length)];
    if (!san) {
      throw new Error('No legal reply available');
    }
    return this.chess.move(san);
  }
}
