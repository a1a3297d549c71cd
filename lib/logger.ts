import * as winston from 'winston';

export const logFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ message, timestamp, level, mainLabel, childLabel }) => {
    return `${timestamp} | ${level} | ${childLabel || mainLabel} | ${message}`;
  }),
);

const Logger = winston.createLogger({
  defaultMeta: { mainLabel: 'webserver' },
  level: process.env['LOG_LEVEL'] ?? 'info',
  format: logFormat,
  transports: [new winston.transports.Console()],
});

export const createLogger = (logInfo: string[]) => {
  const logInfoString = logInfo.join(' | ');
  return Logger.child({ childLabel: logInfoString });
};
