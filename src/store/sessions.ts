import { EngineFactory } from '../engine/MoveEngine';
import { log } from '../log';
import { GameSession, GameSessionOptions } from '../telechess/GameSession';

/**
 * Active games keyed by Telegram user id. Callers serialise access per user;
 * the store itself does no locking.
 */
export interface SessionStore {
  /** Start a fresh game, replacing (and releasing) any game the user has. */
  create(userId: number): Promise<GameSession>;
  get(userId: number): GameSession | undefined;
  remove(userId: number): Promise<void>;
  clear(): Promise<void>;
  readonly size: number;
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<number, GameSession>();

  constructor(
    private readonly createEngine: EngineFactory,
    private readonly sessionOptions: GameSessionOptions
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  async create(userId: number): Promise<GameSession> {
    const engine = await this.createEngine();
    const previous = this.sessions.get(userId);
    const session = new GameSession(userId, engine, this.sessionOptions);
    this.sessions.set(userId, session);
    if (previous) {
      log.info({ userId }, 'Replacing active game');
      await previous.dispose();
    }
    return session;
  }

  get(userId: number): GameSession | undefined {
    return this.sessions.get(userId);
  }

  async remove(userId: number): Promise<void> {
    const session = this.sessions.get(userId);
    if (!session) return;
    this.sessions.delete(userId);
    await session.dispose();
  }

  async clear(): Promise<void> {
    const all = Array.from(this.sessions.values());
    this.sessions.clear();
    await Promise.all(all.map(s => s.dispose()));
  }
}
