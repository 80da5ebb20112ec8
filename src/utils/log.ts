/* eslint-disable no-console */
// Tagged console logging. Level comes from DMG_LOG (error|warn|info|debug|trace), default warn.

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const ORDER: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3, trace: 4 };

const isLevel = (v: string): v is LogLevel => Object.prototype.hasOwnProperty.call(ORDER, v);

let threshold: number = ORDER.warn;

export function setLogLevel(level: LogLevel): void {
  threshold = ORDER[level];
}

export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = (env.DMG_LOG ?? '').trim().toLowerCase();
  return isLevel(raw) ? raw : 'warn';
}

setLogLevel(logLevelFromEnv());

// Per-concern trace switches, e.g. TRACE_SERIAL=1
export const envFlag = (name: string, env: NodeJS.ProcessEnv = process.env): boolean => env[name] === '1';

export interface Logger {
  error(msg: string): void;
  warn(msg: string): void;
  info(msg: string): void;
  debug(msg: string): void;
  trace(msg: string): void;
}

export function createLogger(tag: string): Logger {
  const enabled = (level: LogLevel): boolean => ORDER[level] <= threshold;
  const emit = (level: LogLevel, msg: string): void => {
    if (!enabled(level)) return;
    const line = `[${tag}] ${msg}`;
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  };
  return {
    error: (m) => emit('error', m),
    warn: (m) => emit('warn', m),
    info: (m) => emit('info', m),
    debug: (m) => emit('debug', m),
    trace: (m) => emit('trace', m),
  };
}

export const hex2 = (v: number): string => (v & 0xFF).toString(16).toUpperCase().padStart(2, '0');
export const hex4 = (v: number): string => (v & 0xFFFF).toString(16).toUpperCase().padStart(4, '0');
