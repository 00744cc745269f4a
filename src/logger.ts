import winston from 'winston';
import { settings } from './config';

const lineFormat = winston.format.printf((info) => {
  const scope = typeof info.scope === 'string' ? `[${info.scope}] ` : '';
  return `${info.timestamp} |${info.level} | ${scope}${info.message}`;
});

export const logger = winston.createLogger({
  level: settings.app.log_level.toLowerCase(),
  format: winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    lineFormat
  ),
  // stdout stays free for command output such as `nexusmind --json`.
  transports: [
    new winston.transports.Console({ stderrLevels: Object.keys(winston.config.npm.levels) })
  ],
});

export const createLogger = (scope: string): winston.Logger => logger.child({ scope });

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
