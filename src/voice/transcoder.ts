import { spawn } from 'node:child_process';

import { log } from '../log';
import { ok, Outcome, unavailable } from '../types';

export type RunCommand = (command: string, args: string[]) => Promise<void>;

export const runCommand: RunCommand = (command, args) =>
  new Promise<void>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'ignore', 'pipe'] });
    let stderr = '';
    child.stderr.on('data', chunk => {
      stderr += String(chunk);
    });
    child.on('error', reject);
    child.on('close', code => {
      if (code === 0) {
        resolve();
      } else {
        reject(new Error(`${command} exited with code ${code}: ${stderr.slice(-500)}`));
      }
    });
  });

export interface Transcoder {
  /** Convert `input` to a mono 16 kHz PCM WAV at `output`. */
  toWav(input: string, output: string): Promise<Outcome<string>>;
}

export class FfmpegTranscoder implements Transcoder {
  constructor(
    private readonly ffmpegPath: string,
    private readonly run: RunCommand = runCommand
  ) {}

  async toWav(input: string, output: string): Promise<Outcome<string>> {
    const args = ['-y', '-i', input, '-acodec', 'pcm_s16le', '-ac', '1', '-ar', '16000', output];
    try {
      await this.run(this.ffmpegPath, args);
      return ok(output);
    } catch (err) {
      log.error({ err, ffmpeg: this.ffmpegPath }, 'Audio transcoding failed');
      return unavailable('transcoder', err);
    }
  }
}
