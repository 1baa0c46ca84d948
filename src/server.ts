import express from 'express';
import http from 'http';
import type { Telegraf } from 'telegraf';
import * as Sentry from '@sentry/node';

import { createBot } from './bot';
import { Config, ConfigError, loadConfigFromDotenv } from './config';
import { engineFactory } from './engine';
import { log } from './log';
import { register } from './metrics';
import { RemoteBoardRenderer } from './render/boardImage';
import { MemorySessionStore, SessionStore } from './store/sessions';
import { ensureHttps } from './utils/ensureHttps';
import { VoicePipeline } from './voice/pipeline';
import { GoogleSpeechRecognizer } from './voice/speech';
import { FfmpegTranscoder } from './voice/transcoder';

const logger = log;

export function createApp(sessions: SessionStore, bot?: Telegraf): express.Express {
  const app = express();
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', games: sessions.size, timestamp: new Date().toISOString() });
  });

  app.get('/metrics', async (_req, res) => {
    res.set('Content-Type', register.contentType);
    res.end(await register.metrics());
  });

  // Telegram webhook endpoint
  if (bot) {
    app.post('/bot', bot.webhookCallback('/bot'));
  }

  return app;
}

export async function start(config: Config): Promise<void> {
  if (config.sentryDsn) {
    Sentry.init({ dsn: config.sentryDsn });
  }

  const sessions = new MemorySessionStore(engineFactory(config.engine), {
    moveTimeMs: config.engine.moveTimeMs
  });
  const renderer = new RemoteBoardRenderer(config.board);
  const voice = new VoicePipeline({
    transcoder: new FfmpegTranscoder(config.voice.ffmpegPath),
    recognizer: new GoogleSpeechRecognizer(config.voice),
    locales: config.voice.locales
  });
  if (!config.voice.speechKey) {
    logger.warn('SPEECH_API_KEY not set - voice messages will be answered with an error');
  }

  logger.info('🔧 Initializing bot...');
  const bot = createBot(config, { sessions, renderer, voice });
  const app = createApp(sessions, config.server.publicUrl ? bot : undefined);
  const server = http.createServer(app);

  await new Promise<void>(resolve => server.listen(config.server.port, resolve));
  logger.info(`🚀 Server running on port ${config.server.port}`);

  // With a public URL Telegram pushes updates to /bot; otherwise poll
  if (config.server.publicUrl) {
    const webhookUrl = `${ensureHttps(config.server.publicUrl)}/bot`;
    logger.info(`🔗 Setting webhook to: ${webhookUrl}`);
    await bot.telegram.setWebhook(webhookUrl);
    logger.info('✅ Webhook set successfully');
  } else {
    logger.info('🔄 Development mode - using polling');
    bot.launch().catch(err => {
      logger.error({ err }, '❌ Bot polling stopped');
      process.exitCode = 1;
    });
  }
  logger.info({ username: config.telegram.username }, '🤖 Bot started');

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully`);
    if (!config.server.publicUrl) {
      bot.stop(signal);
    }
    sessions
      .clear()
      .catch(err => logger.error({ err }, 'Failed to release engines'))
      .finally(() => server.close(() => process.exit(0)));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  let config: Config;
  try {
    config = loadConfigFromDotenv();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal(err.message);
      process.exit(1);
    }
    throw err;
  }
  start(config).catch(err => {
    logger.fatal({ err }, 'Failed to start');
    process.exit(1);
  });
}
