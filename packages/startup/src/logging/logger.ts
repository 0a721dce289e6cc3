/**
 * Minimal logging surface used by the orchestrator.
 *
 * Hosts can route startup logs into their own logger by passing any object
 * with these three methods as `OrchestratorConfig.logger`.
 */
export interface StartupLogger {
  debug(message: string): void;
  warn(message: string): void;
  error(message: string, error: unknown): void;
}

export interface ConsoleLoggerOptions {
  /** Prefix of every line (defaults to `[Ignition]`). */
  prefix?: string;
  /** Print debug lines. Off by default. */
  debug?: boolean;
}

export const DEFAULT_LOG_PREFIX = '[Ignition]';

/**
 * Console-backed logger. Debug lines are dropped unless `debug` is set.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): StartupLogger {
  const prefix = options.prefix ?? DEFAULT_LOG_PREFIX;
  const debugEnabled = options.debug ?? false;
  return {
    debug(message) {
      if (debugEnabled) console.debug(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
    error(message, error) {
      console.error(`${prefix} ${message}`, error);
    },
  };
}

/**
 * Whether debug logging is requested through the environment.
 */
export function isDebugFromEnv(): boolean {
  return typeof process !== 'undefined' && process.env?.IGNITION_DEBUG === '1';
}
