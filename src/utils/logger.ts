import pino from 'pino';

/**
 * Shared structured logger.
 *
 * Level comes from LOG_LEVEL; tests run silent unless LOG_LEVEL says otherwise.
 */
const defaultLevel = process.env.NODE_ENV === 'test' ? 'silent' : 'info';

export const logger = pino({
  name: 'hilbert-geocode',
  level: process.env.LOG_LEVEL || defaultLevel,
});
