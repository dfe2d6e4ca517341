/**
 * Observability Module
 *
 * Captures errors and operational messages raised while records and their
 * relations are written. Follows the provider pattern: pluggable backends
 * with a console default.
 *
 * Providers:
 *   - ConsoleObservabilityProvider (structured JSON on the console)
 *   - NullObservabilityProvider (discards everything)
 *
 * Usage:
 *   import { initObservability, captureException, captureMessage } from "./observability";
 *
 *   initObservability();  // Call once at startup; picks the provider from env
 *
 *   captureException(error, { entity: "Task", recordId: "abc" });
 *   captureMessage("Relation save skipped", "warning", { relation: "tasks" });
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Severity levels for messages */
export type ObservabilitySeverity = "fatal" | "error" | "warning" | "info" | "debug";

/** Context tags attached to every event for filtering */
export interface ObservabilityContext {
  entity?: string;
  recordId?: string | number;
  relation?: string;
  [key: string]: unknown;
}

/** The provider contract. Every observability backend implements this. */
export interface ObservabilityProvider {
  /** Provider name (for logging) */
  readonly name: string;

  /** Capture an exception / error */
  captureException(error: Error, context?: ObservabilityContext): void;

  /** Capture a message with severity level */
  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void;

  /** Set context for all subsequent captures */
  setContext(context: ObservabilityContext): void;

  /** Flush pending events to the backend (for graceful shutdown) */
  flush(timeoutMs?: number): Promise<void>;
}

// ---------------------------------------------------------------------------
// Console Provider
// ---------------------------------------------------------------------------

export class ConsoleObservabilityProvider implements ObservabilityProvider {
  readonly name = "console";
  private context: ObservabilityContext = {};

  captureException(error: Error, context?: ObservabilityContext): void {
    console.error(
      JSON.stringify({
        level: "error",
        context: "observability",
        event: "exception",
        message: error.message,
        stack: error.stack,
        ...this.context,
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
        ...this.context,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  setContext(context: ObservabilityContext): void {
    this.context = { ...this.context, ...context };
  }

  async flush(): Promise<void> {
    // Console writes are synchronous
  }
}

// ---------------------------------------------------------------------------
// Null Provider
// ---------------------------------------------------------------------------

export class NullObservabilityProvider implements ObservabilityProvider {
  readonly name = "none";

  captureException(): void {}

  captureMessage(): void {}

  setContext(): void {}

  async flush(): Promise<void> {}
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let provider: ObservabilityProvider = new ConsoleObservabilityProvider();

// ---------------------------------------------------------------------------
// Initialization
// ---------------------------------------------------------------------------

/**
 * Initialize the observability module.
 * Picks the provider from the OBSERVABILITY_PROVIDER environment variable:
 *   - "none" → NullObservabilityProvider
 *   - anything else → ConsoleObservabilityProvider
 *
 * Safe to call multiple times. Never throws.
 */
export function initObservability(): void {
  if (process.env.OBSERVABILITY_PROVIDER === "none") {
    provider = new NullObservabilityProvider();
  } else {
    provider = new ConsoleObservabilityProvider();
  }
}

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

/** Set context for subsequent captures */
export function setObservabilityContext(context: ObservabilityContext): void {
  provider.setContext(context);
}

/** Flush pending events (call during graceful shutdown) */
export async function flushObservability(timeoutMs?: number): Promise<void> {
  await provider.flush(timeoutMs);
}

/** Get the current observability provider (for testing/inspection) */
export function getObservabilityProvider(): ObservabilityProvider {
  return provider;
}

/** Override the observability provider (for testing) */
export function setObservabilityProvider(p: ObservabilityProvider): void {
  provider = p;
}

// ---------------------------------------------------------------------------
// Testing Helpers
// ---------------------------------------------------------------------------

/** Reset observability module state (for testing only) */
export function resetObservability(): void {
  provider = new ConsoleObservabilityProvider();
}
