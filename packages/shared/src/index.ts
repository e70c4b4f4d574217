export type {
  TelemetryConfig,
  BindAddress,
  SensorType,
  SensorConfig,
  ServiceDefinition,
} from "./types/telemetry.js";
