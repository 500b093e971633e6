import { defaultDebugConfig, LogLevel, type DebugConfig } from '../config/debug.js';

let debugConfig: DebugConfig = defaultDebugConfig();

/**
 * Replace the active logging configuration. Entry points call this once with
 * the `debug` section of the loaded AppConfig.
 */
export function configureLogger(config: DebugConfig): void {
  debugConfig = { ...config };
}

export function getLoggerConfig(): Readonly<DebugConfig> {
  return debugConfig;
}

export type DebugCategory = 'prompt' | 'provider' | 'interpret' | 'validation' | 'search';

function categoryEnabled(category: DebugCategory): boolean {
  if (!debugConfig.enabled) {
    return false;
  }

  switch (category) {
    case 'prompt':
      return debugConfig.logPrompt;
    case 'provider':
      return debugConfig.logProvider;
    case 'interpret':
      return debugConfig.logInterpret;
    case 'validation':
      return debugConfig.logValidation;
    case 'search':
      return debugConfig.logSearch;
    default:
      return false;
  }
}

interface LogEntry {
  timestamp: string;
  level: string;
  category?: string;
  message: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[debugConfig.logLevel];
}

const errorReplacer = (_key: string, val: unknown) => {
  if (val instanceof Error) {
    return { name: val.name, message: val.message, stack: val.stack };
  }
  return val;
};

const serialize = (value: unknown) => {
  try {
    return JSON.stringify(value, errorReplacer, 2);
  } catch (error) {
    return `[unserializable: ${error instanceof Error ? error.message : String(error)}]`;
  }
};

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, category, message, ...rest } = entry;
  const categoryStr = category ? `[stock-search:${category}]` : '[stock-search]';
  const levelStr = `[${level.toUpperCase()}]`;

  const base = `${timestamp} ${levelStr} ${categoryStr} ${message}`;

  if (Object.keys(rest).length === 0) {
    return base;
  }

  return `${base}\n${serialize(rest)}`;
}

function formatJson(entry: LogEntry): string {
  try {
    return JSON.stringify(entry, errorReplacer);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      _serializationError: `Failed to serialize: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
}

function emit(entry: LogEntry): void {
  const output = debugConfig.logFormat === 'json' ? formatJson(entry) : formatPretty(entry);
  console.error(output);
}

function describeError(error: Error): Record<string, unknown> {
  const described: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause) {
    described.cause = error.cause;
  }
  return described;
}

class Logger {
  private createEntry(
    level: LogLevel,
    category: string | undefined,
    message: string,
    payload?: unknown
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (category) {
      entry.category = category;
    }

    if (payload === undefined) {
      return entry;
    }

    if (payload instanceof Error) {
      entry.error = describeError(payload);
    } else if (typeof payload === 'object' && payload !== null && !Array.isArray(payload)) {
      for (const [key, val] of Object.entries(payload)) {
        entry[key] = val instanceof Error ? describeError(val) : val;
      }
    } else {
      entry.data = payload;
    }

    return entry;
  }

  debug(category: DebugCategory, message: string, payload?: unknown): void {
    if (!categoryEnabled(category) || !shouldLog(LogLevel.DEBUG)) {
      return;
    }

    emit(this.createEntry(LogLevel.DEBUG, category, message, payload));
  }

  info(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.INFO)) {
      return;
    }

    emit(this.createEntry(LogLevel.INFO, undefined, message, payload));
  }

  warn(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.WARN)) {
      return;
    }

    emit(this.createEntry(LogLevel.WARN, undefined, message, payload));
  }

  error(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.ERROR)) {
      return;
    }

    emit(this.createEntry(LogLevel.ERROR, undefined, message, payload));
  }

  metric(metricName: string, payload: Record<string, unknown>): void {
    if (!shouldLog(LogLevel.INFO)) {
      return;
    }

    const entry = this.createEntry(LogLevel.INFO, undefined, metricName, payload);
    entry.type = 'metric';
    emit(entry);
  }

  /**
   * Time an async operation. Emits a metric with `durationMs` on success and an
   * error entry on failure; the failure is rethrown.
   */
  async span<T>(
    spanName: string,
    metadata: Record<string, unknown>,
    fn: () => Promise<T>
  ): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      if (debugConfig.enableRequestTiming) {
        this.metric(spanName, { ...metadata, durationMs: Date.now() - start });
      }
      return result;
    } catch (error) {
      this.error(`${spanName} failed`, {
        ...metadata,
        durationMs: Date.now() - start,
        error: error instanceof Error ? { name: error.name, message: error.message } : error,
      });
      throw error;
    }
  }
}

export const logger = new Logger();

export function debugLog(category: DebugCategory, message: string, payload?: unknown) {
  logger.debug(category, message, payload);
}
