/**
 * Decode raw configuration (usually parsed JSON) into typed config objects.
 *
 * Defaults are applied first, then the result is validated against the
 * TypeBox schema. Unknown keys are rejected.
 */

import { Value } from "@sinclair/typebox/value";
import type { TObject } from "@sinclair/typebox";
import type { SensorConfig, TelemetryConfig } from "@telemetry-endpoint/shared";
import { ConfigError } from "../telemetry/errors.js";
import { SensorSchema, TelemetrySchema } from "./telemetry.schemas.js";

/** Describe the first schema violation, e.g. `/port: Expected integer` */
function firstError(schema: TObject, value: unknown): string {
  const error = Value.Errors(schema, value).First();
  if (!error) return "invalid value";
  return `${error.path || "/"}: ${error.message}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeTelemetryConfig(raw: unknown): TelemetryConfig {
  const input = raw ?? {};
  if (!isRecord(input)) {
    throw new ConfigError("Telemetry configuration error: expected an object");
  }

  const value = Value.Default(TelemetrySchema, Value.Clone(input));
  if (!Value.Check(TelemetrySchema, value)) {
    throw new ConfigError(
      `Telemetry configuration error: ${firstError(TelemetrySchema, value)}`,
    );
  }

  const config: TelemetryConfig = {
    port: value.port,
    interfaces: typeof value.interfaces === "string" ? [value.interfaces] : value.interfaces,
    tags: value.tags,
    serviceName: value.serviceName,
    path: value.path,
    ttl: value.ttl,
    poll: value.poll,
  };
  if (value.sensors !== undefined) config.sensors = value.sensors;
  return config;
}

/**
 * Decode one raw sensor configuration.
 * Throws a plain Error; the sensor factory wraps it as a CollectorError.
 */
export function decodeSensorConfig(raw: unknown): SensorConfig {
  if (!isRecord(raw)) {
    throw new Error("expected an object");
  }
  if (!Value.Check(SensorSchema, raw)) {
    throw new Error(firstError(SensorSchema, raw));
  }
  return { ...raw };
}
