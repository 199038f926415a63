/**
 * Structured logging for buffer internals.
 *
 * Emits one JSON line per event (timestamp, level, scope, message and any
 * extra fields) to stderr. Zero external dependencies; the threshold comes
 * from `@ringstream/config` unless a level is passed explicitly.
 */

import { config, type LogLevel } from '@ringstream/config';

export type LogFields = Record<string, unknown>;

/** Receives one serialized JSON entry, without the trailing newline. */
export type LogSink = (line: string) => void;

export interface Logger {
  readonly scope: string;
  readonly level: LogLevel;
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Infinity,
};

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? config.logLevel;
  const sink = options.sink ?? stderrSink;
  const threshold = SEVERITY[level];

  const emit = (entryLevel: Exclude<LogLevel, 'silent'>, msg: string, fields?: LogFields): void => {
    if (SEVERITY[entryLevel] < threshold) return;
    sink(JSON.stringify({
      ts: new Date().toISOString(),
      level: entryLevel,
      scope,
      msg,
      ...fields,
    }));
  };

  return {
    scope,
    level,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  };
}
