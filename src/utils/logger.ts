import winston from 'winston';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function resolveLevel(value: string | undefined): LogLevel {
  const match = LOG_LEVELS.find(level => level === value);
  return match ?? 'info';
}

/**
 * Logger setup shared by every module; `service` ends up in each line's metadata.
 */
export function createServiceLogger(service: string): winston.Logger {
  return winston.createLogger({
    level: resolveLevel(process.env.LOG_LEVEL),
    format: winston.format.json(),
    defaultMeta: { service },
    transports: [
      new winston.transports.Console({
        format: winston.format.simple(),
      }),
    ],
  });
}
