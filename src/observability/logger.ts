import pino from 'pino';

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'warn');

/**
 * Process-wide logger. Writes to stderr so structured logs never interleave
 * with the interactive shell's stdout.
 */
export const logger = pino(
  {
    level,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  },
  pino.destination({ dest: 2, sync: true }),
);

