/**
 * Error types shared across modules.
 *
 * Only ConfigError ever escapes to callers of the controller factory.
 * SourceReadError is absorbed by the producer loop and surfaces to pollers
 * as `running: false`.
 */

/** A mapping configuration that cannot be installed. Nothing is loaded. */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** The event source failed or disconnected mid-read. */
export class SourceReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SourceReadError";
  }
}

/** An event-rate measurement ended early because the controller stopped. */
export class MeasurementAbortedError extends Error {
  constructor(message = "Controller stopped before the measurement completed") {
    super(message);
    this.name = "MeasurementAbortedError";
  }
}

/** An event-rate measurement saw too few events before its deadline. */
export class MeasurementTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Event-rate measurement did not complete within ${timeoutMs} ms`);
    this.name = "MeasurementTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}
