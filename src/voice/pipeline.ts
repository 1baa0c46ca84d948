import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { log } from '../log';
import { Outcome } from '../types';
import { recognizeWithFallback, SpeechRecognizer, Transcript } from './speech';
import { Transcoder } from './transcoder';

export interface VoiceTranscriber {
  transcribe(audio: Buffer): Promise<Outcome<Transcript>>;
}

export interface VoicePipelineOptions {
  transcoder: Transcoder;
  recognizer: SpeechRecognizer;
  locales: string[];
  tmpRoot?: string;
}

/**
 * Voice note (OGG/Opus as Telegram sends it) to text. Works in a fresh temp
 * directory that is removed whatever the outcome.
 */
export class VoicePipeline implements VoiceTranscriber {
  constructor(private readonly opts: VoicePipelineOptions) {}

  async transcribe(audio: Buffer): Promise<Outcome<Transcript>> {
    const dir = await mkdtemp(path.join(this.opts.tmpRoot ?? tmpdir(), 'voice-'));
    try {
      const oggPath = path.join(dir, 'voice.ogg');
      const wavPath = path.join(dir, 'voice.wav');
      await writeFile(oggPath, audio);

      const converted = await this.opts.transcoder.toWav(oggPath, wavPath);
      if (converted.status !== 'ok') {
        return converted;
      }

      const wav = await readFile(converted.value);
      return await recognizeWithFallback(this.opts.recognizer, wav, this.opts.locales);
    } finally {
      await rm(dir, { recursive: true, force: true }).catch(err =>
        log.error({ err, dir }, 'Failed to remove voice temp files')
      );
    }
  }
}
