import { Params } from 'nestjs-pino';

const env = process.env.NODE_ENV ?? 'development';

export const loggerConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL ?? (env === 'production' ? 'info' : 'debug'),

    // Pretty-print for development; tests and production log plain JSON
    transport:
      env !== 'production' && env !== 'test'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              singleLine: false,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,

    // Customize base log object (remove unwanted default fields)
    base: null, // Removes pid, hostname, etc.
  },
};
