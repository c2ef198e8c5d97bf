import winston from 'winston';
import path from 'path';
import fs from 'fs';

export interface Logger {
  error: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  http: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
}

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom log levels
const levels: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

const colors: Record<string, string> = {
  error: 'red',
  warn: 'yellow',
  info: 'cyan',
  http: 'magenta',
  debug: 'gray',
};

winston.addColors(colors);

interface LogInfo {
  level: string;
  message: string;
  timestamp?: string;
  context?: string;
  stack?: string;
}

function formatLine(info: LogInfo, upperLevel: boolean): string {
  const ctx = info.context ? ` [${info.context}]` : '';
  const msg = info.stack || info.message;
  const level = upperLevel ? info.level.toUpperCase() : info.level;
  return `${info.timestamp} ${level}${ctx} ${msg}`;
}

const consoleFormat = printf((info) => formatLine(info as LogInfo, false));

/**
 * Redact credentials that end up in log lines: bot tokens and
 * `user:password@` pairs inside URLs.
 */
export function sanitizeLogMessage(message: string): string {
  let sanitized = message;

  sanitized = sanitized.replace(/(\b[a-z][a-z0-9+.-]*:\/\/[^:\s/@]*:)[^@\s]+@/gi, '$1****@');
  sanitized = sanitized.replace(/\b[\w-]{24,28}\.[\w-]{6}\.[\w-]{27,38}\b/g, '[token]');

  return sanitized;
}

// Colors only when stdout is a TTY (containers get plain lines)
const isTty = typeof process.stdout?.isTTY === 'boolean' && process.stdout.isTTY;
const consoleTransportFormat = isTty
  ? combine(colorize({ all: true }), consoleFormat)
  : combine(consoleFormat);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleTransportFormat,
  }),
];

// Error file only outside tests and only when the logs dir is writable
if (process.env['NODE_ENV'] !== 'test') {
  try {
    const logsDir = path.join(__dirname, '..', 'logs');
    if (!fs.existsSync(logsDir)) {
      fs.mkdirSync(logsDir, { recursive: true });
    }
    transports.push(
      new winston.transports.File({
        filename: path.join(logsDir, 'error.log'),
        level: 'error',
        format: combine(
          timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          printf((info) => formatLine(info as LogInfo, true))
        ),
      })
    );
  } catch (err) {
    // Read-only filesystem: console only
    const reason = err instanceof Error ? err.message : String(err);
    process.stderr.write(`Error log file disabled: ${reason}\n`);
  }
}

const logger = winston.createLogger({
  levels,
  level: process.env['LOG_LEVEL'] || 'info',
  format: combine(errors({ stack: true }), timestamp({ format: 'HH:mm:ss' })),
  transports,
});

/**
 * Create a logger that tags every line with `[context]`
 */
export function createLogger(context: string): Logger {
  return {
    error: (message: string, meta: Record<string, unknown> = {}) =>
      logger.error(sanitizeLogMessage(message), { context, ...meta }),
    warn: (message: string, meta: Record<string, unknown> = {}) =>
      logger.warn(sanitizeLogMessage(message), { context, ...meta }),
    info: (message: string, meta: Record<string, unknown> = {}) =>
      logger.info(sanitizeLogMessage(message), { context, ...meta }),
    http: (message: string, meta: Record<string, unknown> = {}) =>
      logger.http(sanitizeLogMessage(message), { context, ...meta }),
    debug: (message: string, meta: Record<string, unknown> = {}) =>
      logger.debug(sanitizeLogMessage(message), { context, ...meta }),
  };
}

export { logger };
