/**
 * Shared runtime interfaces provided by the platform.
 */

/**
 * Structured logger.
 * Platform components log through this instead of console.log.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}
