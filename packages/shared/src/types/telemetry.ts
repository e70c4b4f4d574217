/**
 * Types for the telemetry endpoint configuration and its sensors.
 *
 * These describe the decoded (defaults applied) configuration consumed by
 * the listener lifecycle manager, and the shapes it exposes to callers.
 */

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Decoded telemetry configuration */
export interface TelemetryConfig {
  /** TCP port to bind (default: 9090) */
  port: number;
  /** Ordered interface specifiers used to resolve the bind IP */
  interfaces: string[];
  /** Passed through to service discovery, not interpreted here */
  tags: string[];
  /** Raw sensor configurations; absent when none are configured */
  sensors?: unknown[];
  /** Name advertised to service discovery (default: "telemetry") */
  serviceName: string;
  /** URL path of the exposition endpoint (default: "/metrics") */
  path: string;
  /** Advertisement TTL in seconds (default: 15) */
  ttl: number;
  /** Advertisement poll interval in seconds (default: 5) */
  poll: number;
}

/** Host + port the listener binds to */
export interface BindAddress {
  host: string;
  port: number;
}

// ---------------------------------------------------------------------------
// Sensors
// ---------------------------------------------------------------------------

export type SensorType = "counter" | "gauge" | "histogram" | "summary";

/** Decoded sensor configuration */
export interface SensorConfig {
  namespace?: string;
  subsystem?: string;
  name: string;
  help: string;
  type: SensorType;
  /** Poll interval in seconds */
  interval: number;
  /** Command run on each poll; its stdout is the observed value */
  check: string | string[];
  /** Check timeout; seconds or a duration string ("500ms", "5s") */
  timeout?: number | string;
}

// ---------------------------------------------------------------------------
// Service discovery
// ---------------------------------------------------------------------------

/** What a discovery backend needs to advertise the metrics endpoint */
export interface ServiceDefinition {
  name: string;
  ipAddress: string;
  port: number;
  path: string;
  ttl: number;
  poll: number;
  tags: string[];
}
