import pino from 'pino';
import { config } from '../config/env';

function defaultLevel(): string {
  if (config.NODE_ENV === 'test') return 'silent';
  return config.NODE_ENV === 'development' ? 'debug' : 'info';
}

const logger = pino({
  name: 'study-tracker',
  level: config.LOG_LEVEL ?? defaultLevel()
});

export default logger;
