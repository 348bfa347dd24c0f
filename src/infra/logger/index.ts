/**
 * Process logger (pino)
 *
 * JSON lines in production, pino-pretty elsewhere. Connection strings are
 * redacted wherever they appear under a `database` binding.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  /** Value of the `name` binding on every line */
  service: string;
  pretty: boolean;
}

const REDACTED_PATHS = ['database.url', 'config.database.url', '*.connectionString'];

/**
 * Shared by the process logger and the Fastify request logger.
 */
export const prettyTransport = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:HH:MM:ss.l',
    ignore: 'pid,hostname',
  },
};

export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const {
    level = 'info',
    service = 'lighting-indicators-server',
    pretty = process.env['NODE_ENV'] !== 'production',
  } = config;

  const options: LoggerOptions = {
    name: service,
    level,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    serializers: { err: pinoLib.stdSerializers.err },
    ...(pretty && { transport: prettyTransport }),
  };

  return pinoLib(options);
};

export { type Logger } from 'pino';
