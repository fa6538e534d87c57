import pino from 'pino';

/**
 * Logger factory - creates structured logger instances.
 * Logs go to stderr; stdout carries the operator transcript.
 */
export function createLogger(serviceName: string) {
  return pino(
    {
      name: serviceName,
      level: process.env.LOG_LEVEL || 'info',
      formatters: {
        level: (label) => {
          return { level: label };
        }
      },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination(2)
  );
}

export type Logger = ReturnType<typeof createLogger>;
