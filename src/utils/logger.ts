import pino, { type LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const nodeEnv = process.env.NODE_ENV || 'development';
const requested = process.env.LOG_LEVEL?.trim();

const level =
  LEVELS.find((candidate) => candidate === requested) ??
  (nodeEnv === 'test' ? 'silent' : nodeEnv === 'development' ? 'debug' : 'info');

export const logger = pino({
  level,
  base: { service: 'itemtype-admin' },
  timestamp: pino.stdTimeFunctions.isoTime,
});
