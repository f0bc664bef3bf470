export type Level = 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export type Logger = {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
};

export type LogSink = (level: Level, line: string) => void;

export type LoggerOptions = {
  /** Bracketed tag at the start of every line. */
  scope?: string;
  sink?: LogSink;
  now?: () => Date;
};

// Sequence numbers and other bigints show up in claim metadata.
function serialize(meta: LogMeta): string {
  try {
    return JSON.stringify(meta, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value));
  } catch {
    return String(meta);
  }
}

export function formatLine(scope: string, level: Level, message: string, ts: Date, meta?: LogMeta): string {
  const base = `[${scope}] ${ts.toISOString()} ${level.toUpperCase()} ${message}`;
  return meta && Object.keys(meta).length ? `${base} ${serialize(meta)}` : base;
}

export const consoleSink: LogSink = (level, line) => {
  // eslint-disable-next-line no-console
  if (level === 'error') console.error(line);
  // eslint-disable-next-line no-console
  else if (level === 'warn') console.warn(line);
  // eslint-disable-next-line no-console
  else console.log(line);
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const scope = options.scope ?? 'offers';
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date());

  const emit = (level: Level) => (message: string, meta?: LogMeta) => {
    sink(level, formatLine(scope, level, message, now(), meta));
  };

  return { info: emit('info'), warn: emit('warn'), error: emit('error') };
}

export const logger = createLogger();
