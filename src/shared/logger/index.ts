import winston from 'winston';

export const createLogger = (defaultMeta: Record<string, unknown> = {}): winston.Logger =>
  winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    defaultMeta: {
      service: 'taler-merchant-client',
      environment: process.env.NODE_ENV || 'development',
      ...defaultMeta,
    },
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, ...meta }) => {
            const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
            return `${String(timestamp)} [${level}]: ${String(message)} ${metaStr}`;
          }),
        ),
      }),
    ],
  });

export const describeError = (error: unknown): Record<string, unknown> =>
  error instanceof Error
    ? { name: error.name, message: error.message, stack: error.stack }
    : { message: String(error) };
