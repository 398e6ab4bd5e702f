import winston from 'winston';
import config from './config.js';

/**
 * Custom log format combining timestamp and message.
 * Format: `YYYY-MM-DDTHH:mm:ss.sssZ [LEVEL]: message`
 * Metadata passed as the second argument is appended as JSON.
 */
const logFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf(({ level, message, timestamp, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} [${level.toUpperCase()}]: ${message}${extra}`;
  })
);

/**
 * List of Winston transports (outputs) for the logger.
 * - Console always writes to stderr: stdout carries the MCP protocol in
 *   STDIO mode and is left clean for the CLI's own summary otherwise.
 * - A file transport is added when LOG_FILE is configured.
 */
const transports: winston.transport[] = [
  new winston.transports.Console({
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
  }),
];

if (config.logger.file) {
  transports.push(new winston.transports.File({ filename: config.logger.file }));
}

/**
 * Application logger instance configured with timestamped format.
 * The log level is determined by the configuration (defaulting to 'info').
 */
const logger = winston.createLogger({
  level: config.logger.level,
  format: logFormat,
  transports,
});

export default logger;
