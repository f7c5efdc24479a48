import { pino } from 'pino';

const defaultLevel = process.env.VITEST ? 'silent' : 'info';

export const logger = pino({
  name: 'schema-mirror',
  level: process.env.LOG_LEVEL || defaultLevel,
});
