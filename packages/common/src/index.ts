export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug: (message: string, meta?: Record<string, JsonValue>) => void;
  info: (message: string, meta?: Record<string, JsonValue>) => void;
  warn: (message: string, meta?: Record<string, JsonValue>) => void;
  error: (message: string, meta?: Record<string, JsonValue>) => void;
}

export interface LineSink {
  write: (line: string) => unknown;
}

export interface JsonLoggerOptions {
  level?: LogLevel;
  sink?: LineSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const createJsonLogger = ({ level = 'info', sink = process.stdout }: JsonLoggerOptions = {}): Logger => {
  const emit = (entryLevel: LogLevel, message: string, meta?: Record<string, JsonValue>) => {
    if (LEVEL_ORDER[entryLevel] < LEVEL_ORDER[level]) {
      return;
    }
    const payload = {
      ts: new Date().toISOString(),
      level: entryLevel,
      message,
      ...(meta ? { meta } : {})
    };
    sink.write(`${JSON.stringify(payload)}\n`);
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta)
  };
};

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : 'unknown');

export const status = {
  record: {
    validated: 'validated',
    photoResolved: 'photo_resolved',
    rendered: 'rendered',
    written: 'written',
    rejected: 'rejected',
    failed: 'failed'
  },
  failureStage: {
    photo: 'photo',
    render: 'render',
    write: 'write'
  }
} as const;

export type FailureStage = (typeof status.failureStage)[keyof typeof status.failureStage];

export * from './errors.js';
export * from './sanitize.js';
export * from './dossier/renderContext.js';
export * from './dossier/buildRenderContext.js';
export * from './dossier/renderTemplate.js';
