/**
 * Observability Module
 *
 * Captures errors and operational messages raised by the mapper.
 * Follows the provider pattern: a pluggable backend with a console fallback.
 *
 * Usage:
 *   import { captureException, captureMessage } from "./observability";
 *
 *   captureException(error, { entity: "Book" });
 *   captureMessage("Dangling reference resolved to empty", "warning", { field: "author" });
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ObservabilitySeverity = "fatal" | "error" | "warning" | "info" | "debug";

/** Context tags attached to every event for filtering */
export interface ObservabilityContext {
  entity?: string;
  [key: string]: unknown;
}

/** The provider contract. Every observability backend implements this. */
export interface ObservabilityProvider {
  /** Provider name (for logging) */
  readonly name: string;

  captureException(error: Error, context?: ObservabilityContext): void;

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void;

  /** Flush pending events to the backend (for graceful shutdown) */
  flush(timeoutMs?: number): Promise<void>;
}

// ---------------------------------------------------------------------------
// Console Provider (default, structured console output)
// ---------------------------------------------------------------------------

export class ConsoleObservabilityProvider implements ObservabilityProvider {
  readonly name = "console";

  captureException(error: Error, context?: ObservabilityContext): void {
    console.error(
      JSON.stringify({
        level: "error",
        context: "observability",
        event: "exception",
        errorName: error.name,
        message: error.message,
        stack: error.stack,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void {
    const logFn =
      level === "fatal" || level === "error"
        ? console.error
        : level === "warning"
          ? console.warn
          : level === "debug"
            ? console.debug
            : console.log;

    logFn(
      JSON.stringify({
        level,
        context: "observability",
        event: "message",
        message,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  async flush(): Promise<void> {
    // Console writes are synchronous
  }
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let provider: ObservabilityProvider = new ConsoleObservabilityProvider();

// ---------------------------------------------------------------------------
// Public API (delegates to provider)
// ---------------------------------------------------------------------------

/** Capture an exception through the observability provider */
export function captureException(
  error: Error,
  context?: ObservabilityContext
): void {
  provider.captureException(error, context);
}

/** Capture a message with severity level */
export function captureMessage(
  message: string,
  level: ObservabilitySeverity = "info",
  context?: ObservabilityContext
): void {
  provider.captureMessage(message, level, context);
}

/** Flush pending events (call during graceful shutdown) */
export async function flushObservability(timeoutMs?: number): Promise<void> {
  await provider.flush(timeoutMs);
}

/** Get the current observability provider */
export function getObservabilityProvider(): ObservabilityProvider {
  return provider;
}

/** Replace the observability provider (e.g., an error-tracking backend) */
export function setObservabilityProvider(p: ObservabilityProvider): void {
  provider = p;
}

/** Reset to the console provider (for testing) */
export function resetObservability(): void {
  provider = new ConsoleObservabilityProvider();
}
