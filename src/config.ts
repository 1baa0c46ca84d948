import dotenv from 'dotenv';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface Config {
  telegram: {
    token: string;
    username: string;
  };
  engine: {
    path: string;
    moveTimeMs: number;
    threads: number;
  };
  voice: {
    ffmpegPath: string;
    speechUrl: string;
    speechKey?: string;
    locales: string[];
  };
  board: {
    imageUrl: string;
    size: number;
  };
  server: {
    port: number;
    publicUrl?: string;
  };
  sentryDsn?: string;
}

type Env = Record<string, string | undefined>;

const DEFAULT_SPEECH_URL = 'https://www.google.com/speech-api/v2/recognize';
const DEFAULT_BOARD_URL = 'https://lichess1.org/export/fen.gif';

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Build the runtime configuration from environment variables.
 * Throws ConfigError when the bot credential or identity is missing.
 */
export function loadConfig(env: Env = process.env): Config {
  const token = optional(env, 'TELEGRAM_BOT_TOKEN');
  const username = optional(env, 'TELEGRAM_BOT_USERNAME');
  if (!token || !username) {
    throw new ConfigError('TELEGRAM_BOT_TOKEN and TELEGRAM_BOT_USERNAME must be set');
  }

  const locales = (optional(env, 'SPEECH_LOCALES') ?? 'tr-TR,en-US')
    .split(',')
    .map(l => l.trim())
    .filter(Boolean);

  return {
    telegram: { token, username: username.replace(/^@/, '') },
    engine: {
      path: optional(env, 'STOCKFISH_PATH') ?? 'stockfish',
      moveTimeMs: positiveInt(env, 'ENGINE_MOVE_TIME_MS', 2000),
      threads: positiveInt(env, 'ENGINE_THREADS', 2)
    },
    voice: {
      ffmpegPath: optional(env, 'FFMPEG_PATH') ?? 'ffmpeg',
      speechUrl: optional(env, 'SPEECH_API_URL') ?? DEFAULT_SPEECH_URL,
      speechKey: optional(env, 'SPEECH_API_KEY'),
      locales
    },
    board: {
      imageUrl: optional(env, 'BOARD_IMAGE_URL') ?? DEFAULT_BOARD_URL,
      size: positiveInt(env, 'BOARD_IMAGE_SIZE', 8)
    },
    server: {
      port: positiveInt(env, 'PORT', 3000),
      publicUrl: optional(env, 'PUBLIC_URL')
    },
    sentryDsn: optional(env, 'SENTRY_DSN')
  };
}

export function loadConfigFromDotenv(): Config {
  dotenv.config();
  return loadConfig(process.env);
}
