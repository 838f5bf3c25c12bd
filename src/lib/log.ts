import type { LogLevel } from './config.js';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

type Sink = (line: string) => void;

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

// stdout carries the protocol, so diagnostics only ever go to stderr.
const stderrSink: Sink = (line) => console.error(line);

export function createLogger(level: LogLevel = 'info', sink: Sink = stderrSink): Logger {
  const emit = (at: Exclude<LogLevel, 'silent'>, message: string) => {
    if (RANK[at] < RANK[level]) return;
    sink(`[weather-bridge] ${at.toUpperCase()} ${message}`);
  };
  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message)
  };
}
