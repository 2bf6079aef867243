import { inspect } from 'util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  level: LogLevel;
  message: string;
  component?: string;
  meta?: unknown;
  timestamp?: string;
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export type LogSink = (line: string) => void;

function normalizeMeta(meta: unknown): unknown {
  if (meta === undefined) {
    return undefined;
  }
  if (meta instanceof Error) {
    return { name: meta.name, message: meta.message };
  }

  try {
    JSON.stringify(meta);
    return meta;
  } catch {
    return inspect(meta, { depth: 3, breakLength: 80 });
  }
}

export function formatEntry(entry: LogEntry): string {
  const payload: Record<string, unknown> = {
    level: entry.level,
    message: entry.message,
    timestamp: entry.timestamp ?? new Date().toISOString(),
  };

  if (entry.component) {
    payload.component = entry.component;
  }

  const normalizedMeta = normalizeMeta(entry.meta);
  if (normalizedMeta !== undefined) {
    payload.meta = normalizedMeta;
  }

  return JSON.stringify(payload);
}

// stdout belongs to the MCP transport
const stderrSink: LogSink = (line) => {
  console.error(line);
};

export function createLogger(
  component?: string,
  minLevel: LogLevel = 'info',
  sink: LogSink = stderrSink
): Logger {
  const threshold = LOG_LEVELS.indexOf(minLevel);
  const write = (level: LogLevel, message: string, meta?: unknown): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return;
    }
    sink(formatEntry({ level, message, component, meta }));
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}

export const silentLogger: Logger = createLogger(undefined, 'error', () => undefined);
