import axios from 'axios';

import type { Config } from '../config';
import { log } from '../log';
import { invalid, ok, Outcome, unavailable } from '../types';
import { pcmFromWav, toBigEndian16 } from './wav';

const SAMPLE_RATE = 16000;

export interface SpeechRecognizer {
  /** Transcript of a mono 16 kHz PCM WAV in the given locale */
  recognize(wav: Buffer, locale: string): Promise<Outcome<string>>;
}

export type PostAudio = (
  url: string,
  body: Buffer,
  params: Record<string, string>,
  contentType: string
) => Promise<string>;

export const postAudio: PostAudio = async (url, body, params, contentType) => {
  const res = await axios.post<string>(url, body, {
    params,
    headers: { 'Content-Type': contentType },
    responseType: 'text'
  });
  return res.data;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * First transcript in a speech-api/v2 response. The service answers with one
 * JSON object per line, usually an empty `{"result":[]}` first.
 */
export function parseTranscript(body: string): string | null {
  for (const line of body.split('\n')) {
    if (!line.trim()) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      log.warn({ err, line }, 'Unparsable speech response line');
      continue;
    }
    if (!isRecord(parsed) || !Array.isArray(parsed.result)) continue;
    for (const result of parsed.result) {
      if (!isRecord(result) || !Array.isArray(result.alternative)) continue;
      const [best] = result.alternative;
      if (isRecord(best) && typeof best.transcript === 'string' && best.transcript.trim()) {
        return best.transcript.trim();
      }
    }
  }
  return null;
}

export class GoogleSpeechRecognizer implements SpeechRecognizer {
  constructor(
    private readonly opts: Pick<Config['voice'], 'speechUrl' | 'speechKey'>,
    private readonly post: PostAudio = postAudio
  ) {}

  async recognize(wav: Buffer, locale: string): Promise<Outcome<string>> {
    if (!this.opts.speechKey) {
      return unavailable('speech', new Error('SPEECH_API_KEY is not set'));
    }

    let samples: Buffer;
    try {
      samples = toBigEndian16(pcmFromWav(wav));
    } catch (err) {
      return unavailable('transcoder', err);
    }

    let body: string;
    try {
      body = await this.post(
        this.opts.speechUrl,
        samples,
        { client: 'chromium', lang: locale, key: this.opts.speechKey },
        `audio/l16; rate=${SAMPLE_RATE}`
      );
    } catch (err) {
      log.error({ err, locale }, 'Speech request failed');
      return unavailable('speech', err);
    }

    const transcript = parseTranscript(body);
    return transcript ? ok(transcript) : invalid('not-understood');
  }
}

export interface Transcript {
  text: string;
  locale: string;
}

/**
 * Try each locale in turn; the first transcript wins. When every locale
 * fails, the last failure is returned.
 */
export async function recognizeWithFallback(
  recognizer: SpeechRecognizer,
  wav: Buffer,
  locales: string[]
): Promise<Outcome<Transcript>> {
  let last: Outcome<Transcript> = unavailable('speech', new Error('No speech locales configured'));
  for (const locale of locales) {
    const result = await recognizer.recognize(wav, locale);
    if (result.status === 'ok') {
      log.debug({ locale, text: result.value }, 'Speech recognized');
      return ok({ text: result.value, locale });
    }
    last = result;
  }
  return last;
}
