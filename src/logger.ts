/**
 * 分级日志。引擎本身不做 I/O，只有这里会写 console。
 * - production 默认 WARN，其余 INFO
 * - 每个模块用 createLogger(module) 拿到带前缀的 logger
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.NONE]: 'NONE',
};

export interface LoggerConfig {
  minLevel: LogLevel;
  timestamps: boolean;
  showModule: boolean;
}

export type LogFields = Record<string, unknown>;

const getDefaultConfig = (): LoggerConfig => ({
  minLevel: process.env.NODE_ENV === 'production' ? LogLevel.WARN : LogLevel.INFO,
  timestamps: true,
  showModule: true,
});

let config: LoggerConfig = getDefaultConfig();

export function configureLogger(next: Partial<LoggerConfig>): void {
  config = { ...config, ...next };
}

export function setLogLevel(level: LogLevel): void {
  config.minLevel = level;
}

export function getLogLevel(): LogLevel {
  return config.minLevel;
}

export function resetLogger(): void {
  config = getDefaultConfig();
}

export function formatMessage(level: LogLevel, module: string | undefined, message: string): string {
  const parts: string[] = [];
  if (config.timestamps) parts.push(`[${new Date().toISOString()}]`);
  parts.push(`[${LOG_LEVEL_NAMES[level]}]`);
  if (config.showModule && module) parts.push(`[${module}]`);
  parts.push(message);
  return parts.join(' ');
}

function log(level: LogLevel, module: string | undefined, message: string, fields?: LogFields): void {
  if (level < config.minLevel) return;

  const line = formatMessage(level, module, message);
  const args: unknown[] = fields ? [line, fields] : [line];

  switch (level) {
    case LogLevel.DEBUG:
    case LogLevel.INFO:
      console.log(...args);
      break;
    case LogLevel.WARN:
      console.warn(...args);
      break;
    case LogLevel.ERROR:
      console.error(...args);
      break;
  }
}

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export function createLogger(module: string): Logger {
  return {
    debug: (message, fields) => log(LogLevel.DEBUG, module, message, fields),
    info: (message, fields) => log(LogLevel.INFO, module, message, fields),
    warn: (message, fields) => log(LogLevel.WARN, module, message, fields),
    error: (message, fields) => log(LogLevel.ERROR, module, message, fields),
  };
}
