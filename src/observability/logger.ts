import { appendFileSync } from 'fs';

import type { LogLevel } from '../config/settings.js';

export type LogFields = Record<string, unknown>;

export interface LogRecord extends LogFields {
  level: LogLevel;
  event: string;
  timestamp: string;
}

export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// The terminal belongs to the UI, so nothing is written unless a sink is configured.
let sink: LogSink | null = null;
let threshold: LogLevel = 'info';

export function configureLogger(options: {
  level?: LogLevel;
  file?: string;
  sink?: LogSink | null;
}): void {
  threshold = options.level ?? threshold;
  if (options.sink !== undefined) {
    sink = options.sink;
  } else if (options.file) {
    const file = options.file;
    sink = (line) => appendFileSync(file, line + '\n');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function write(level: LogLevel, event: string, fields?: LogFields): void {
  if (!sink || LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }
  const record: LogRecord = {
    ...fields,
    level,
    event,
    timestamp: new Date().toISOString()
  };
  try {
    sink(JSON.stringify(record));
  } catch (err) {
    // A broken log file must not take the UI down with it.
    process.stderr.write(`log write failed: ${errorMessage(err)}\n`);
    sink = null;
  }
}

export function logDebug(event: string, fields?: LogFields): void {
  write('debug', event, fields);
}

export function logInfo(event: string, fields?: LogFields): void {
  write('info', event, fields);
}

export function logWarn(event: string, fields?: LogFields): void {
  write('warn', event, fields);
}

export function logError(event: string, fields?: LogFields): void {
  write('error', event, fields);
}
