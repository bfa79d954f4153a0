import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

// stdout carries command output (CSV paths, reports, JSON); logs go to stderr
export const logger = pino(
  {
    level,
    base: { service: 'intent-recommender' },
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
