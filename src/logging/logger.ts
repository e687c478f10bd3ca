import type { LogLevel } from '../types/config.js';

export type { LogLevel };

export interface LogFields {
  runId?: string;
  [key: string]: unknown;
}

export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? 'info';
let sink: LogSink = (line) => {
  process.stdout.write(line);
};

export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  const normalized = raw?.trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }

  return undefined;
}

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

/** Redirects every logger's output; returns a function restoring the previous sink. */
export function setLogSink(next: LogSink): () => void {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
}

export class Logger {
  constructor(
    private readonly context: string,
    private readonly baseFields: LogFields = {}
  ) {}

  child(fields: LogFields): Logger {
    return new Logger(this.context, { ...this.baseFields, ...fields });
  }

  debug(message: string, fields: LogFields = {}): void {
    this.write('debug', message, fields);
  }

  info(message: string, fields: LogFields = {}): void {
    this.write('info', message, fields);
  }

  warn(message: string, fields: LogFields = {}): void {
    this.write('warn', message, fields);
  }

  error(message: string, fields: LogFields = {}): void {
    this.write('error', message, fields);
  }

  private write(level: LogLevel, message: string, fields: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
      return;
    }

    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...this.baseFields,
      ...fields,
    };

    sink(`${JSON.stringify(entry)}\n`);
  }
}
