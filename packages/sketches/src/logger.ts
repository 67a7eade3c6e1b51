/**
 * Structured logging.
 *
 * Emits one JSON line per entry to stdout with:
 * - timestamp, level, scope (the sketch that logged), message, extra fields
 *
 * Silent unless SKETCHKIT_LOG_LEVEL (or `setLogLevel`) enables a level.
 * Sketches only log rare events (refused inserts, compactions, merges), never
 * per-item traffic.
 */

import { sketchConfig, type LogLevel } from './config.js';

export type EmittedLevel = Exclude<LogLevel, 'silent'>;

export interface LogEntry {
  readonly ts: string;
  readonly level: EmittedLevel;
  readonly scope: string;
  readonly msg: string;
  readonly [field: string]: unknown;
}

export type LogSink = (entry: LogEntry) => void;

export type LogFields = Readonly<Record<string, string | number | boolean | null>>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

const stdoutSink: LogSink = (entry) => {
  process.stdout.write(JSON.stringify(entry) + '\n');
};

let threshold: LogLevel = sketchConfig.logLevel;
let sink: LogSink = stdoutSink;

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/** Replace the output sink. Passing nothing restores stdout. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? stdoutSink;
}

export function isLogEnabled(level: EmittedLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function emit(level: EmittedLevel, scope: string, msg: string, fields?: LogFields): void {
  if (!isLogEnabled(level)) return;
  sink({ ...fields, ts: new Date().toISOString(), level, scope, msg });
}

export function createLogger(scope: string): Logger {
  return {
    debug: (msg, fields) => emit('debug', scope, msg, fields),
    info: (msg, fields) => emit('info', scope, msg, fields),
    warn: (msg, fields) => emit('warn', scope, msg, fields),
    error: (msg, fields) => emit('error', scope, msg, fields),
  };
}
