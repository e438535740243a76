import pino from 'pino';

const environment = process.env.NODE_ENV || 'development';
const disablePrettyPrint = process.env.DISABLE_PRETTY_PRINT_LOGGING === 'true';

// pino-pretty runs in a worker thread, keep it out of production and tests
const usePrettyPrint = environment !== 'production' && environment !== 'test' && !disablePrettyPrint;

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => {
      return { level: label.toUpperCase() };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'marketing-crew',
    environment,
  },
  ...(usePrettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname,service,environment',
      },
    },
  }),
});

export type { Logger } from 'pino';

export default logger;
