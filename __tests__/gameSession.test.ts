import { Chess } from 'chess.js';

import { GameSession } from '../src/telechess/GameSession';
import { boardPart, ScriptedEngine, START_FEN } from './helpers';

const newSession = (replies: string[] = [], fen?: string, random?: () => number) => {
  const engine = new ScriptedEngine(replies);
  const session = new GameSession(7, engine, { moveTimeMs: 2000, fen, random });
  return { engine, session };
};

describe('GameSession.attemptMove', () => {
  it('plays the user move and the engine reply', async () => {
    const { engine, session } = newSession(['e7e5']);
    const outcome = await session.attemptMove('e4');

    expect(outcome).toEqual({ status: 'ok', value: { userMove: 'e4', engineMove: 'e5', gameOver: false } });
    expect(boardPart(session.fen())).toBe('rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR');
    expect(engine.bestMove).toHaveBeenCalledWith(
      expect.stringContaining('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b'),
      { timeMs: 2000 }
    );
  });

  it('accepts coordinate and SAN tokens', async () => {
    const { session } = newSession(['e7e5', 'b8c6']);
    await session.attemptMove('e2e4');
    const outcome = await session.attemptMove('Nf3');
    expect(outcome).toEqual({ status: 'ok', value: { userMove: 'Nf3', engineMove: 'Nc6', gameOver: false } });
    expect(session.moveHistory()).toEqual(['1. e4 e5', '2. Nf3 Nc6']);
  });

  it('rejects an illegal move and leaves the board alone', async () => {
    const { engine, session } = newSession(['e7e5']);
    await expect(session.attemptMove('e5')).resolves.toEqual({ status: 'invalid', reason: 'illegal-move' });
    await expect(session.attemptMove('banana')).resolves.toEqual({ status: 'invalid', reason: 'illegal-move' });
    expect(session.fen()).toBe(START_FEN);
    expect(engine.bestMove).not.toHaveBeenCalled();
  });

  it('plays a random legal reply when the engine fails', async () => {
    const { engine, session } = newSession([], undefined, () => 0);
    engine.bestMove.mockRejectedValueOnce(new Error('engine crashed'));
    const outcome = await session.attemptMove('e4');

    const afterE4 = new Chess();
    afterE4.move('e4');
    const expected = afterE4.moves()[0];
    expect(outcome).toEqual({ status: 'ok', value: { userMove: 'e4', engineMove: expected, gameOver: false } });
  });

  it('plays a random legal reply when the engine suggests nonsense', async () => {
    const { session } = newSession(['a1a1'], undefined, () => 0);
    const outcome = await session.attemptMove('d4');
    expect(outcome.status).toBe('ok');
    expect(session.moveHistory()).toHaveLength(1);
    expect(session.status()).toEqual({ key: 'yourTurn' });
  });

  it('reports checkmate delivered by the engine', async () => {
    const { session } = newSession(['e7e5', 'd8h4']);
    await session.attemptMove('f3');
    const outcome = await session.attemptMove('g4');

    expect(outcome).toEqual({ status: 'ok', value: { userMove: 'g4', engineMove: 'Qh4#', gameOver: true } });
    expect(session.status()).toEqual({ key: 'checkmate', winner: 'b' });
    await expect(session.attemptMove('e4')).resolves.toEqual({ status: 'invalid', reason: 'game-over' });
  });

  it('does not ask the engine after the user mates', async () => {
    const { engine, session } = newSession([], '6k1/5ppp/8/8/8/8/8/R5K1 w - - 0 1');
    const outcome = await session.attemptMove('Ra8');

    expect(outcome).toEqual({ status: 'ok', value: { userMove: 'Ra8#', gameOver: true } });
    expect(session.status()).toEqual({ key: 'checkmate', winner: 'w' });
    expect(engine.bestMove).not.toHaveBeenCalled();
  });

  it('promotes to a queen when a coordinate move omits the piece', async () => {
    const { session } = newSession(['a2a3'], '8/4P3/8/8/8/8/k7/4K3 w - - 0 1');
    const outcome = await session.attemptMove('e7e8');
    expect(outcome).toEqual({ status: 'ok', value: { userMove: 'e8=Q', engineMove: 'Ka3', gameOver: false } });
  });

  it('clears the selected square on every attempt', async () => {
    const { session } = newSession(['e7e5']);
    session.select('e2');
    await session.attemptMove('e5');
    expect(session.selectedSquare).toBeUndefined();
  });
});

describe('GameSession selection', () => {
  it('only selects squares holding one of the user pieces', () => {
    const { session } = newSession();
    expect(session.select('e4')).toBe(false);
    expect(session.selectedSquare).toBeUndefined();
    expect(session.select('e7')).toBe(false);
    expect(session.selectedSquare).toBeUndefined();
    expect(session.select('g1')).toBe(true);
    expect(session.selectedSquare).toBe('g1');
    session.clearSelection();
    expect(session.selectedSquare).toBeUndefined();
  });
});

describe('GameSession.status', () => {
  it.each([
    ['k7/2Q5/1K6/8/8/8/8/8 b - - 0 1', 'stalemate'],
    ['8/8/8/8/8/8/k7/4K3 w - - 0 1', 'insufficientMaterial'],
    ['4k3/8/8/8/8/8/4r3/4K3 w - - 0 1', 'check'],
    [START_FEN, 'yourTurn'],
    ['rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1', 'engineTurn']
  ])('%s is %s', (fen, key) => {
    const { session } = newSession([], fen);
    expect(session.status()).toEqual({ key });
  });
});

test('dispose releases the engine once', async () => {
  const { engine, session } = newSession();
  await session.dispose();
  await session.dispose();
  expect(engine.terminate).toHaveBeenCalledTimes(1);
});
