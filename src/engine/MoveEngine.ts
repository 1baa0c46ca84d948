export type EngineMoveOptions = {
  timeMs: number;
};

/**
 * Something that proposes a reply for a position. Implementations hold an
 * external resource between init() and terminate().
 */
export interface MoveEngine {
  readonly name: string;
  init(): Promise<void>;
  /** Move in coordinate notation ("e7e5", "e7e8q"); "0000" when there is none. */
  bestMove(fen: string, opts: EngineMoveOptions): Promise<string>;
  terminate(): Promise<void>;
}

export type EngineFactory = () => Promise<MoveEngine>;
