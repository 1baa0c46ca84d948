import axios from 'axios';

import type { Config } from '../config';
import { log } from '../log';
import { ok, Outcome, unavailable } from '../types';

const TTL = 60 * 60 * 1000; // 1 hour

export type FetchImage = (url: string, params: Record<string, string | number>) => Promise<Buffer>;

export const fetchImage: FetchImage = async (url, params) => {
  const res = await axios.get<ArrayBuffer>(url, { params, responseType: 'arraybuffer' });
  return Buffer.from(res.data);
};

export interface BoardRenderer {
  render(fen: string): Promise<Outcome<Buffer>>;
}

/**
 * Board pictures from an HTTP endpoint that takes `fen` and `size` query
 * parameters (lichess `export/fen.gif` by default).
 */
export class RemoteBoardRenderer implements BoardRenderer {
  private readonly cache = new Map<string, { buf: Buffer; ts: number }>();

  constructor(
    private readonly opts: Config['board'],
    private readonly fetch: FetchImage = fetchImage,
    private readonly now: () => number = Date.now
  ) {}

  async render(fen: string): Promise<Outcome<Buffer>> {
    const cached = this.cache.get(fen);
    if (cached && this.now() - cached.ts < TTL) {
      return ok(cached.buf);
    }

    try {
      const buf = await this.fetch(this.opts.imageUrl, { fen, size: this.opts.size });
      this.prune();
      this.cache.set(fen, { buf, ts: this.now() });
      return ok(buf);
    } catch (err) {
      log.error({ err, fen }, 'Board image request failed');
      return unavailable('renderer', err);
    }
  }

  private prune(): void {
    const now = this.now();
    for (const [fen, { ts }] of this.cache) {
      if (now - ts >= TTL) this.cache.delete(fen);
    }
  }
}
