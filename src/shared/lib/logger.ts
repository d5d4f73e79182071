import { colorEnabled, createPalette } from './ansi.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Sink for rendered lines. Defaults to process.stderr. */
  write?: (line: string) => void;
}

type LogData = Record<string, unknown>;

export interface Logger {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const jsonMode = options.json ?? false;
  const write = options.write ?? ((line: string) => { process.stderr.write(line); });
  const color = createPalette(!options.write && colorEnabled(process.stderr));

  const tint: Record<LogLevel, (s: string) => string> = {
    debug: color.grey,
    info: (s) => s,
    warn: color.yellow,
    error: color.red,
  };

  function log(level: LogLevel, message: string, data?: LogData) {
    if (LOG_LEVELS[level] < minLevel) return;
    const fields = data ?? {};
    const hasData = Object.keys(fields).length > 0;

    if (jsonMode) {
      const entry = { level, message, timestamp: new Date().toISOString(), ...fields };
      write(JSON.stringify(entry) + '\n');
    } else {
      const dataStr = hasData ? ` ${JSON.stringify(fields)}` : '';
      write(`${tint[level](`[${level}]`)} ${message}${dataStr}\n`);
    }
  }

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
  };
}

/** Global logger instance; configure via setLoggerOptions() */
export let logger = createLogger();

export function setLoggerOptions(options: LoggerOptions): void {
  logger = createLogger(options);
}
