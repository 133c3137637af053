/**
 * Structured logger used across the engine
 */
export interface ChartwrightLogger {
  /**
   * Log trace level messages (most verbose)
   */
  trace(msg: string, meta?: Record<string, unknown>): void;

  debug(msg: string, meta?: Record<string, unknown>): void;

  info(msg: string, meta?: Record<string, unknown>): void;

  warn(msg: string, meta?: Record<string, unknown>): void;

  error(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Log fatal error messages (most severe)
   */
  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: Record<string, unknown>): ChartwrightLogger;
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Configuration options for the logger
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Enable pretty printing for development (default: false)
   */
  pretty?: boolean;

  /**
   * Output destination file (default: stdout)
   */
  destination?: string;

  options?: {
    /**
     * Include timestamp in logs (default: true)
     */
    timestamp?: boolean;
  };
}

/**
 * Context bound to release-scoped loggers
 */
export interface LoggerContext {
  component?: string;
  release?: string;
  namespace?: string;
  revision?: number;
  [key: string]: unknown;
}
