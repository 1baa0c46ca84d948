export type Color = 'w' | 'b';

// External collaborators an interaction can fail on
export type ExternalService = 'renderer' | 'speech' | 'transcoder' | 'download';

export type InvalidReason =
  | 'illegal-move'
  | 'not-understood'
  | 'no-piece'
  | 'game-over';

/**
 * Result of a call that can fail on bad input or on an external service.
 * Handlers switch on `status` to pick the reply.
 */
export type Outcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'invalid'; reason: InvalidReason }
  | { status: 'unavailable'; service: ExternalService; error: unknown };

export interface PlayedMoves {
  userMove: string;      // SAN
  engineMove?: string;   // SAN, absent when the user's move ended the game
  gameOver: boolean;
}

export type MoveOutcome = Outcome<PlayedMoves>;

export const ok = <T>(value: T): Outcome<T> => ({ status: 'ok', value });

export const invalid = <T>(reason: InvalidReason): Outcome<T> => ({ status: 'invalid', reason });

export const unavailable = <T>(service: ExternalService, error: unknown): Outcome<T> => ({
  status: 'unavailable',
  service,
  error
});
