/**
 * Logger factory using Pino
 * Structured JSON logging; human-readable output outside production
 */

import pinoLib, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
  /** Writes JSON lines here instead of stdout; disables pretty output */
  destination?: DestinationStream;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'dataset-sync',
  pretty: process.env['NODE_ENV'] !== 'production',
};

// Provider tokens travel through configuration and request headers
const REDACTED_PATHS = [
  'token',
  'accessToken',
  '*.accessToken',
  'headers.authorization',
  'headers["x-dataverse-key"]',
];

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  };

  if (finalConfig.destination !== undefined) {
    return pinoLib(options, finalConfig.destination);
  }

  // pino-pretty renders to the terminal; it is skipped when nothing would be logged
  if (finalConfig.pretty === true && finalConfig.level !== 'silent') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return pinoLib(options);
};

export { type Logger } from 'pino';
