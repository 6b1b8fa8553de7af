// Source-prefixed console logger. The level is set once from config; tests
// swap the sink to keep output quiet.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

type WritableLevel = Exclude<LogLevel, 'silent'>;

export type LogSink = (level: WritableLevel, line: string, data: unknown[]) => void;

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const consoleSink: LogSink = (level, line, data) => {
  switch (level) {
    case 'debug':
      console.debug(line, ...data);
      break;
    case 'info':
      console.info(line, ...data);
      break;
    case 'warn':
      console.warn(line, ...data);
      break;
    case 'error':
      console.error(line, ...data);
      break;
  }
};

let activeLevel: LogLevel = 'info';
let activeSink: LogSink = consoleSink;

export const configureLogger = (options: { level?: LogLevel; sink?: LogSink }): void => {
  if (options.level) activeLevel = options.level;
  if (options.sink) activeSink = options.sink;
};

export const resetLogger = (): void => {
  activeLevel = 'info';
  activeSink = consoleSink;
};

const getTimestamp = () => new Date().toISOString();

export interface Logger {
  debug: (message: string, ...data: unknown[]) => void;
  info: (message: string, ...data: unknown[]) => void;
  warn: (message: string, ...data: unknown[]) => void;
  error: (message: string, ...data: unknown[]) => void;
}

export const createLogger = (source: string): Logger => {
  const write = (level: WritableLevel, message: string, data: unknown[]) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[activeLevel]) return;
    activeSink(level, `${getTimestamp()} [${level.toUpperCase()}][${source}] ${message}`, data);
  };
  return {
    debug: (message, ...data) => write('debug', message, data),
    info: (message, ...data) => write('info', message, data),
    warn: (message, ...data) => write('warn', message, data),
    error: (message, ...data) => write('error', message, data),
  };
};
