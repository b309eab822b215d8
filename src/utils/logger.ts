import { pino } from 'pino';

export const logger = pino({
  name: 'etl-parity',
  level: process.env.LOG_LEVEL || 'info',
});
