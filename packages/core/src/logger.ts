/**
 * Logging for engine components.
 *
 * Components never reach for a process-wide logger; a logger is passed in
 * through options and defaults to {@link silentLogger}.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface EngineLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export const silentLogger: EngineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export interface ConsoleLoggerConfig {
  prefix?: string;
  level?: LogLevel;
  /** Target console, mainly for tests */
  sink?: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;
}

export function createConsoleLogger(config: ConsoleLoggerConfig = {}): EngineLogger {
  const { prefix = '[seqlens]', level = 'info', sink = console } = config;
  const threshold = LEVEL_ORDER[level];

  const write =
    (at: Exclude<LogLevel, 'silent'>) =>
    (message: string, context?: Record<string, unknown>): void => {
      if (LEVEL_ORDER[at] < threshold) return;
      if (context && Object.keys(context).length > 0) {
        sink[at](`${prefix} ${message}`, context);
      } else {
        sink[at](`${prefix} ${message}`);
      }
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

/**
 * Read the log level from `SEQLENS_LOG_LEVEL`.
 * Unknown values fall back to the given default.
 */
export function resolveLogLevel(
  env: Record<string, string | undefined> = process.env,
  fallback: LogLevel = 'silent'
): LogLevel {
  const raw = env.SEQLENS_LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) return raw;
  return fallback;
}

/** Logger configured from the environment; silent unless `SEQLENS_LOG_LEVEL` is set. */
export function createEnvLogger(
  env: Record<string, string | undefined> = process.env
): EngineLogger {
  const level = resolveLogLevel(env);
  return level === 'silent' ? silentLogger : createConsoleLogger({ level });
}
