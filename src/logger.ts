import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

// stdout carries rendered templates and reports, so logs always go to stderr
const transport =
  level !== 'silent' &&
  (process.stderr.isTTY || process.env.NODE_ENV === 'development')
    ? pino.transport({
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      })
    : pino.destination(2);

export const logger = pino({ level }, transport);

/** Raise or lower the log level at runtime (e.g. for `--verbose`). */
export function setLogLevel(next: string): void {
  logger.level = next;
}

// Route uncaught errors through pino so they get timestamps in stderr
process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
});
