export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogFormat = 'json' | 'pretty';

export interface DebugConfig {
  enabled: boolean;
  logPrompt: boolean;
  logProvider: boolean;
  logInterpret: boolean;
  logValidation: boolean;
  logSearch: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
  enableRequestTiming: boolean;
  enableTokenTracking: boolean;
  slowSearchThresholdMs: number;
}

export const toBool = (value: string | undefined, defaultValue: boolean) => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'true';
};

export const toNumber = (value: string | undefined, defaultValue: number): number => {
  if (!value) {
    return defaultValue;
  }

  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : defaultValue;
};

const toLogLevel = (value: string | undefined, defaultValue: LogLevel): LogLevel => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return defaultValue;
  }
};

const toLogFormat = (value: string | undefined, defaultValue: LogFormat): LogFormat => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  return normalized === 'json' ? 'json' : defaultValue;
};

/**
 * Configuration the logger starts with before `configureLogger` is called:
 * info level, pretty output, debug categories off.
 */
export function defaultDebugConfig(): DebugConfig {
  return {
    enabled: false,
    logPrompt: false,
    logProvider: false,
    logInterpret: false,
    logValidation: false,
    logSearch: false,
    logLevel: LogLevel.INFO,
    logFormat: 'pretty',
    enableRequestTiming: true,
    enableTokenTracking: true,
    slowSearchThresholdMs: 500,
  };
}

export function loadDebugConfig(env: NodeJS.ProcessEnv = process.env): DebugConfig {
  const enabled = toBool(env.STOCK_SEARCH_DEBUG_MODE, false);

  // Observability settings apply whether or not debug mode is on
  const logLevel = toLogLevel(env.STOCK_SEARCH_LOG_LEVEL, LogLevel.INFO);
  const logFormat = toLogFormat(env.STOCK_SEARCH_LOG_FORMAT, 'pretty');
  const enableRequestTiming = toBool(env.STOCK_SEARCH_ENABLE_REQUEST_TIMING, true);
  const enableTokenTracking = toBool(env.STOCK_SEARCH_ENABLE_TOKEN_TRACKING, true);
  const slowSearchThresholdMs = Math.max(
    0,
    toNumber(env.STOCK_SEARCH_SLOW_SEARCH_THRESHOLD_MS, 500)
  );

  if (!enabled) {
    return {
      ...defaultDebugConfig(),
      logLevel,
      logFormat,
      enableRequestTiming,
      enableTokenTracking,
      slowSearchThresholdMs,
    };
  }

  return {
    enabled: true,
    logPrompt: toBool(env.STOCK_SEARCH_DEBUG_PROMPT, true),
    logProvider: toBool(env.STOCK_SEARCH_DEBUG_PROVIDER, true),
    logInterpret: toBool(env.STOCK_SEARCH_DEBUG_INTERPRET, true),
    logValidation: toBool(env.STOCK_SEARCH_DEBUG_VALIDATION, true),
    logSearch: toBool(env.STOCK_SEARCH_DEBUG_SEARCH, true),
    logLevel,
    logFormat,
    enableRequestTiming,
    enableTokenTracking,
    slowSearchThresholdMs,
  };
}
