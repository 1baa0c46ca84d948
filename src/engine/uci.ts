import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';

import { log } from '../log';
import { EngineMoveOptions, MoveEngine } from './MoveEngine';

/** The parts of a child process the engine talks to. */
export interface EngineProcess {
  stdin: Writable;
  stdout: Readable;
  onError(listener: (err: Error) => void): void;
  onExit(listener: (code: number | null) => void): void;
  kill(): void;
}

export type SpawnProcess = (path: string) => EngineProcess;

export const spawnUciProcess: SpawnProcess = (path) => {
  const child = spawn(path, [], { stdio: 'pipe' });
  return {
    stdin: child.stdin,
    stdout: child.stdout,
    onError: listener => { child.on('error', listener); },
    onExit: listener => { child.on('exit', code => listener(code)); },
    kill: () => { child.kill(); }
  };
};

export interface UciOptions {
  threads: number;
  handshakeTimeoutMs?: number;
  // Added to the movetime before a silent engine is given up on
  graceMs?: number;
}

type Pending = {
  expect: 'readyok' | 'bestmove';
  resolve: (value: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
};

export class UciEngine implements MoveEngine {
  readonly name = 'uci';
  private proc: EngineProcess | null = null;
  private pending: Pending | null = null;
  // Searches given up on whose bestmove line has not arrived yet
  private abandoned = 0;

  constructor(
    private readonly path: string,
    private readonly opts: UciOptions,
    private readonly spawnProcess: SpawnProcess = spawnUciProcess
  ) {}

  async init(): Promise<void> {
    if (this.proc) {
      return;
    }
    const proc = this.spawnProcess(this.path);
    this.proc = proc;

    proc.onError(err => this.fail(err));
    proc.onExit(code => {
      this.proc = null;
      this.fail(new Error(`UCI engine exited with code ${code}`));
    });
    proc.stdin.on('error', err => this.fail(err));
    createInterface({ input: proc.stdout }).on('line', line => this.handleLine(line.trim()));

    const ready = this.expect('readyok', this.opts.handshakeTimeoutMs ?? 4000);
    this.send('uci');
    this.send(`setoption name Threads value ${this.opts.threads}`);
    this.send('isready');
    await ready;
    log.debug({ path: this.path }, 'UCI engine ready');
  }

  async bestMove(fen: string, opts: EngineMoveOptions): Promise<string> {
    if (this.pending) {
      throw new Error('Engine is busy');
    }
    if (!this.proc) {
      throw new Error('UCI engine not running');
    }
    const reply = this.expect('bestmove', opts.timeMs + (this.opts.graceMs ?? 5000));
    this.send(`position fen ${fen}`);
    this.send(`go movetime ${opts.timeMs}`);
    return reply;
  }

  async terminate(): Promise<void> {
    const proc = this.proc;
    this.proc = null;
    this.fail(new Error('UCI engine terminated'));
    if (!proc) {
      return;
    }
    if (proc.stdin.writable) {
      proc.stdin.write('quit\n');
    }
    proc.kill();
  }

  private send(command: string): void {
    if (!this.proc) {
      throw new Error('UCI engine not running');
    }
    this.proc.stdin.write(`${command}\n`);
  }

  private expect(expect: Pending['expect'], timeoutMs: number): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.fail(new Error(`UCI engine timed out waiting for ${expect}`));
        if (expect === 'bestmove') this.abandon();
      }, timeoutMs);
      this.pending = { expect, resolve, reject, timer };
    });
  }

  // Every `go` ends in exactly one bestmove line, so the late answer of an
  // abandoned search must not settle the next request
  private abandon(): void {
    this.abandoned++;
    if (this.proc?.stdin.writable) {
      this.proc.stdin.write('stop\n');
    }
  }

  private handleLine(line: string): void {
    if (this.abandoned > 0 && line.startsWith('bestmove')) {
      this.abandoned--;
      log.debug({ line }, 'Dropped bestmove of an abandoned search');
      return;
    }
    const pending = this.pending;
    if (!pending) {
      return;
    }
    if (pending.expect === 'readyok' && line === 'readyok') {
      this.settle().resolve(line);
      return;
    }
    if (pending.expect === 'bestmove' && line.startsWith('bestmove')) {
      this.settle().resolve(line.split(/\s+/)[1] ?? '0000');
    }
  }

  private fail(error: Error): void {
    if (this.pending) {
      this.settle().reject(error);
    }
  }

  private settle(): Pick<Pending, 'resolve' | 'reject'> {
    const pending = this.pending;
    this.pending = null;
    if (!pending) {
      return { resolve: () => undefined, reject: () => undefined };
    }
    clearTimeout(pending.timer);
    return pending;
  }
}
