import pino from 'pino';

export const log = pino({
  name: 'survey-runtime',
  level: process.env.LOG_LEVEL?.trim() || 'info',
  base: { service: 'voice-survey-runtime' },
});

export type Logger = typeof log;
