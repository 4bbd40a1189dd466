import pino from 'pino';
import { getConfig } from '../config.js';

const config = getConfig();

export const logger = config.LOG_LEVEL === 'silent'
  ? pino({ level: 'silent' })
  : pino({
    level: config.LOG_LEVEL,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: false,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
        destination: config.LOG_FILE,
        mkdir: true,
      },
    },
  });
