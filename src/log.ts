import pino from 'pino';
import { env } from './env';

export const log = pino({
  name: 'voice-dialogue-runtime',
  level: env.LOG_LEVEL,
});
