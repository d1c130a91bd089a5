import { pino } from 'pino';

export const logger = pino({
  name: 'survey-star-api',
  level: process.env.LOG_LEVEL ?? 'info'
});
