import { LoggerService, LogLevel } from '@nestjs/common';
import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';

export interface AppLoggerOptions {
  level?: string;
  logDir?: string;
  /** Extra transports, replacing the default console + file set when given */
  transports?: winston.transport[];
}

const upperLevel = winston.format(info => {
  info.level = info.level.toUpperCase();
  return info;
});

// Custom format for better readability
const customFormat = winston.format.printf(({ level, message, timestamp, context, ...metadata }) => {
  const scope = typeof context === 'string' ? ` [${context}]` : '';
  let msg = `${timestamp} [${level}]${scope} ${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

function defaultTransports(logDir: string): winston.transport[] {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  return [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp({ format: 'HH:mm:ss' }),
        upperLevel(),
        winston.format.colorize(),
        customFormat,
      ),
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'pipeline.log'),
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
      tailable: true,
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'pipeline-error.log'),
      level: 'error',
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
      tailable: true,
    }),
  ];
}

export function createAppLogger(options: AppLoggerOptions = {}): winston.Logger {
  const logDir = options.logDir ?? path.join(process.cwd(), 'logs');

  return winston.createLogger({
    level: options.level ?? 'info',
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      upperLevel(),
      customFormat,
    ),
    transports: options.transports ?? defaultTransports(logDir),
    exitOnError: false,
  });
}

/**
 * Routes Nest's Logger calls (and therefore every service's
 * `new Logger(Service.name)`) into winston.
 */
export class WinstonNestLogger implements LoggerService {
  constructor(private readonly logger: winston.Logger) {}

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.write('error', message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write('warn', message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write('debug', message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write('verbose', message, optionalParams);
  }

  setLogLevels(levels: LogLevel[]): void {
    const order: LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'];
    const lowest = order.find(level => levels.includes(level));
    if (lowest) {
      this.logger.level = lowest === 'log' ? 'info' : lowest === 'fatal' ? 'error' : lowest;
    }
  }

  /**
   * Nest passes the context as the last optional param, and for errors the
   * stack trace before it.
   */
  private write(level: string, message: unknown, params: unknown[]): void {
    const rest = [...params];
    const context = rest.length > 0 && typeof rest[rest.length - 1] === 'string' ? rest.pop() : undefined;
    const text = message instanceof Error ? message.message : String(message);
    const extra = rest.filter(p => p !== undefined).map(p => (p instanceof Error ? p.stack ?? p.message : String(p)));

    this.logger.log({
      level,
      message: extra.length > 0 ? `${text} ${extra.join(' ')}` : text,
      ...(context !== undefined ? { context } : {}),
    });
  }
}
