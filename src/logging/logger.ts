import pino from 'pino';

export type { Logger } from 'pino';

/**
 * Module logger shared by the parsers. Level comes from LOG_LEVEL.
 */
export const logger = pino({
  name: 'media-type',
  level: process.env.LOG_LEVEL || 'info',
});
