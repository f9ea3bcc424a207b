import pino from 'pino';
import { DEFAULT_LOG_LEVEL, LOG_LEVELS, SERVER_NAME } from './constants.js';

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Level used until the configuration has been validated. An unknown value
 * falls back to the default here and is reported by `loadConfig`.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? DEFAULT_LOG_LEVEL;
}

// stdout carries JSON-RPC for the stdio transport, so logs go to stderr
export const logger = pino(
  {
    name: SERVER_NAME,
    level: resolveLogLevel(process.env.LOG_LEVEL),
  },
  pino.destination(2)
);
