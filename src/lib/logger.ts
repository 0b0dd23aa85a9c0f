import fs from 'node:fs';
import path from 'node:path';
import winston from 'winston';
import type { Logger } from 'winston';

export type { Logger };

export interface LoggerOptions {
  debug?: boolean;
  logDir?: string;
  now?: Date;
}

const lineFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp }) => `${level.toUpperCase()} ${String(timestamp)}; ${String(message)}`)
);

function yyyymmdd(d: Date): string {
  const mm = String(d.getMonth() + 1).padStart(2, '0');
  const dd = String(d.getDate()).padStart(2, '0');
  return `${d.getFullYear()}${mm}${dd}`;
}

export function logFilePath(logDir: string, now = new Date()): string {
  return path.join(logDir, `cds_log_${yyyymmdd(now)}.txt`);
}

/** Console gets warnings only (everything with --debug); the daily file in `logDir` keeps info and above. */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const { debug = false, logDir, now = new Date() } = opts;

  const consoleTransport = new winston.transports.Console({
    level: debug ? 'debug' : 'warn',
    stderrLevels: ['error', 'warn', 'info', 'debug'],
  });

  if (!logDir) {
    return winston.createLogger({ level: 'debug', format: lineFormat, transports: [consoleTransport], exitOnError: false });
  }

  fs.mkdirSync(logDir, { recursive: true });
  const file = new winston.transports.File({
    filename: logFilePath(logDir, now),
    level: debug ? 'debug' : 'info',
  });

  return winston.createLogger({ level: 'debug', format: lineFormat, transports: [consoleTransport, file], exitOnError: false });
}

export function silentLogger(): Logger {
  return winston.createLogger({
    transports: [new winston.transports.Console({ silent: true })],
  });
}
