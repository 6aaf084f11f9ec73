import pino from 'pino';
import { config } from '../config/index.js';

const rootLogger = pino({
  level: process.env.LOG_LEVEL || (config.nodeEnv === 'production' ? 'info' : 'debug'),
});

export function createLogger(service: string): pino.Logger {
  return rootLogger.child({ service });
}
