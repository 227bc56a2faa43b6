import { env } from '../config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type Meta = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function log(level: LogLevel, scope: string | undefined, message: string, meta?: Meta): void {
  if (LEVELS[level] < LEVELS[env.LOG_LEVEL]) return;
  const ts = new Date().toISOString();
  const text = scope ? `${scope}: ${message}` : message;
  const out = env.LOG_FORMAT === 'json'
    ? JSON.stringify({ timestamp: ts, level, scope, message, ...meta })
    : meta ? `[${ts}] [${level.toUpperCase()}] ${text} ${JSON.stringify(meta)}`
           : `[${ts}] [${level.toUpperCase()}] ${text}`;
  if (level === 'error') process.stderr.write(out + '\n');
  else process.stdout.write(out + '\n');
}

export interface Logger {
  debug: (msg: string, meta?: Meta) => void;
  info:  (msg: string, meta?: Meta) => void;
  warn:  (msg: string, meta?: Meta) => void;
  error: (msg: string, meta?: Meta) => void;
  scope: (name: string) => Logger;
}

function createLogger(scope?: string): Logger {
  return {
    debug: (msg, meta) => log('debug', scope, msg, meta),
    info:  (msg, meta) => log('info',  scope, msg, meta),
    warn:  (msg, meta) => log('warn',  scope, msg, meta),
    error: (msg, meta) => log('error', scope, msg, meta),
    scope: (name) => createLogger(scope ? `${scope}/${name}` : name),
  };
}

export const logger = createLogger();
