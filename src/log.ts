import pino from 'pino';

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

export const log = pino({ level, base: { app: 'voice-chess-bot' } });
