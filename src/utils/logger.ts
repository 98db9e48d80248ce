import { env } from '../config/env';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

const levelOrder: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

const shouldLog = (level: LogLevel): boolean => levelOrder[level] >= levelOrder[env.LOG_LEVEL];

const format = (level: LogLevel, message: string, meta?: Record<string, unknown>): string => {
  const payload = {
    level,
    time: new Date().toISOString(),
    msg: message,
    ...meta,
  };
  return JSON.stringify(payload);
};

// stdout belongs to the interactive menu
const log = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
  if (!shouldLog(level)) return;
  console.error(format(level, message, meta));
};

export const logger = {
  trace: (msg: string, meta?: Record<string, unknown>) => { log('trace', msg, meta); },
  debug: (msg: string, meta?: Record<string, unknown>) => { log('debug', msg, meta); },
  info: (msg: string, meta?: Record<string, unknown>) => { log('info', msg, meta); },
  warn: (msg: string, meta?: Record<string, unknown>) => { log('warn', msg, meta); },
  error: (msg: string, meta?: Record<string, unknown>) => { log('error', msg, meta); },
};
