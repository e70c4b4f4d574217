/**
 * Telemetry Module
 *
 * Lifecycle manager for the metrics endpoint plus the pieces it is built
 * from. Hosts construct a Telemetry, then call start()/stop().
 */

export { Telemetry } from "./telemetry.js";
export type { TelemetryOptions, FatalHandler } from "./telemetry.js";
export type { Listener, Binder } from "./listener.js";
export { fastifyBinder, formatAddress } from "./listener.js";
export {
  TelemetryError,
  ConfigError,
  CollectorError,
  BindError,
  ExpectedCloseError,
  UnexpectedServeError,
  CloseError,
} from "./errors.js";
export { loadTelemetryConfig } from "../config/load.js";
export { Sensor } from "../sensors/index.js";
export type { CheckRunner } from "../sensors/index.js";
