import { Counter, Gauge, register } from 'prom-client';

export const updatesTotal = new Counter({
  name: 'bot_updates_total',
  help: 'Telegram updates handled',
  labelNames: ['type']
});

export const movesTotal = new Counter({
  name: 'chess_moves_total',
  help: 'User move attempts',
  labelNames: ['source', 'result']
});

export const voiceTotal = new Counter({
  name: 'voice_messages_total',
  help: 'Voice messages by outcome',
  labelNames: ['outcome']
});

export const activeGames = new Gauge({
  name: 'chess_active_games',
  help: 'Games currently in progress'
});

export { register };
