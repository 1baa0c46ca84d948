import { ConfigError, loadConfig } from '../src/config';

const base = { TELEGRAM_BOT_TOKEN: 'test-token', TELEGRAM_BOT_USERNAME: '@test_chess_bot' };

describe('loadConfig', () => {
  it('fills in defaults', () => {
    expect(loadConfig(base)).toEqual({
      telegram: { token: 'test-token', username: 'test_chess_bot' },
      engine: { path: 'stockfish', moveTimeMs: 2000, threads: 2 },
      voice: {
        ffmpegPath: 'ffmpeg',
        speechUrl: 'https://www.google.com/speech-api/v2/recognize',
        speechKey: undefined,
        locales: ['tr-TR', 'en-US']
      },
      board: { imageUrl: 'https://lichess1.org/export/fen.gif', size: 8 },
      server: { port: 3000, publicUrl: undefined },
      sentryDsn: undefined
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      ...base,
      STOCKFISH_PATH: '/opt/stockfish',
      ENGINE_MOVE_TIME_MS: '500',
      SPEECH_API_KEY: 'test-secret',
      SPEECH_LOCALES: ' en-US , tr-TR ,',
      PORT: '8080',
      PUBLIC_URL: 'bot.example.test'
    });
    expect(config.engine).toEqual({ path: '/opt/stockfish', moveTimeMs: 500, threads: 2 });
    expect(config.voice.speechKey).toBe('test-secret');
    expect(config.voice.locales).toEqual(['en-US', 'tr-TR']);
    expect(config.server).toEqual({ port: 8080, publicUrl: 'bot.example.test' });
  });

  it.each([
    [{ TELEGRAM_BOT_USERNAME: 'bot' }],
    [{ TELEGRAM_BOT_TOKEN: 'test-token' }],
    [{ TELEGRAM_BOT_TOKEN: '  ', TELEGRAM_BOT_USERNAME: 'bot' }]
  ])('requires the bot credentials (%o)', env => {
    expect(() => loadConfig(env)).toThrow(ConfigError);
  });

  it.each(['0', '-5', '1.5', 'soon'])('rejects ENGINE_THREADS=%s', value => {
    expect(() => loadConfig({ ...base, ENGINE_THREADS: value })).toThrow(
      `ENGINE_THREADS must be a positive integer, got "${value}"`
    );
  });
});
