/**
 * Error taxonomy for the telemetry endpoint.
 *
 * Construction errors (ConfigError, CollectorError) are thrown to the caller.
 * Runtime errors raised by the background serving task have no caller to
 * return to: they are classified and either dropped or handed to the fatal
 * handler.
 */

export class TelemetryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TelemetryError";
  }
}

/** Invalid configuration, address resolution or route registration */
export class ConfigError extends TelemetryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/** A sensor could not be built from its configuration */
export class CollectorError extends TelemetryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CollectorError";
  }
}

/** The listener could not be bound. Fatal. */
export class BindError extends TelemetryError {
  constructor(
    public readonly address: string,
    options?: { cause?: unknown },
  ) {
    super(`Error serving telemetry on ${address}: ${describe(options?.cause)}`, options);
    this.name = "BindError";
  }
}

/** The serving task ended after an intentional stop. Never surfaced. */
export class ExpectedCloseError extends TelemetryError {
  constructor(options?: { cause?: unknown }) {
    super("Telemetry listener closed by stop()", options);
    this.name = "ExpectedCloseError";
  }
}

/** The serving task ended while the listener was still meant to be active. Fatal. */
export class UnexpectedServeError extends TelemetryError {
  constructor(
    public readonly address: string,
    options?: { cause?: unknown },
  ) {
    super(
      options?.cause === undefined
        ? `Telemetry listener on ${address} closed unexpectedly`
        : `Error in telemetry HTTP server on ${address}: ${describe(options.cause)}`,
      options,
    );
    this.name = "UnexpectedServeError";
  }
}

/** Closing the listener failed. Reported, not fatal. */
export class CloseError extends TelemetryError {
  constructor(
    public readonly address: string,
    options?: { cause?: unknown },
  ) {
    super(`Telemetry listener shutdown failed on ${address}: ${describe(options?.cause)}`, options);
    this.name = "CloseError";
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
