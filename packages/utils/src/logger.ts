/**
 * Logger
 *
 * Pino-based structured logger shared by every package. Entries go to
 * stderr; stdout carries the CLI's tables and JSON.
 */

import pino, { type LoggerOptions } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

const STDERR = 2;

const options: LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'vidshrink',
    env: NODE_ENV,
  },
};

export const logger = NODE_ENV === 'development'
  ? pino({
    ...options,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        destination: STDERR,
        ignore: 'pid,hostname,service,env,component',
        messageFormat: '{if component}[{component}] {end}{msg}',
      },
    },
  })
  : pino(options, pino.destination(STDERR));

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export interface JobBindings {
  id: string;
  path: string;
}

/**
 * Child of `parent` whose entries all carry the job id and its file
 */
export function createJobLogger(parent: Logger, job: JobBindings): Logger {
  return parent.child({ jobId: job.id, file: job.path });
}
