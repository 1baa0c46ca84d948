import type { Config } from '../config';
import { log } from '../log';
import { EngineFactory, MoveEngine } from './MoveEngine';
import { RandomEngine } from './random';
import { SpawnProcess, spawnUciProcess, UciEngine } from './uci';

/**
 * Start the configured UCI engine. When the binary is missing or does not
 * answer the handshake, replies come from a RandomEngine instead.
 */
export async function acquireEngine(
  opts: Config['engine'],
  spawnProcess: SpawnProcess = spawnUciProcess
): Promise<MoveEngine> {
  const engine = new UciEngine(opts.path, { threads: opts.threads }, spawnProcess);
  try {
    await engine.init();
    return engine;
  } catch (err) {
    log.warn({ err, path: opts.path }, 'UCI engine unavailable, using random replies');
    await engine.terminate();
    return new RandomEngine();
  }
}

export function engineFactory(opts: Config['engine']): EngineFactory {
  return () => acquireEngine(opts);
}

export type { EngineFactory, MoveEngine } from './MoveEngine';
