/**
 * TypeBox schemas for the raw telemetry and sensor configuration.
 */

import { Type } from "@sinclair/typebox";

export const TELEMETRY_DEFAULTS = {
  port: 9090,
  serviceName: "telemetry",
  path: "/metrics",
  ttl: 15,
  poll: 5,
} as const;

export const TelemetrySchema = Type.Object(
  {
    port: Type.Integer({ minimum: 0, maximum: 65535, default: TELEMETRY_DEFAULTS.port }),
    interfaces: Type.Union([Type.String(), Type.Array(Type.String())], { default: [] }),
    tags: Type.Array(Type.String(), { default: [] }),
    sensors: Type.Optional(Type.Array(Type.Unknown())),
    serviceName: Type.String({ minLength: 1, default: TELEMETRY_DEFAULTS.serviceName }),
    path: Type.String({ pattern: "^/", default: TELEMETRY_DEFAULTS.path }),
    ttl: Type.Integer({ minimum: 1, default: TELEMETRY_DEFAULTS.ttl }),
    poll: Type.Integer({ minimum: 1, default: TELEMETRY_DEFAULTS.poll }),
  },
  { additionalProperties: false },
);

export const SensorSchema = Type.Object(
  {
    namespace: Type.Optional(Type.String()),
    subsystem: Type.Optional(Type.String()),
    name: Type.String({ minLength: 1 }),
    help: Type.String({ minLength: 1 }),
    type: Type.Union([
      Type.Literal("counter"),
      Type.Literal("gauge"),
      Type.Literal("histogram"),
      Type.Literal("summary"),
    ]),
    interval: Type.Integer({ minimum: 1 }),
    check: Type.Union([
      Type.String({ minLength: 1 }),
      Type.Array(Type.String(), { minItems: 1 }),
    ]),
    timeout: Type.Optional(Type.Union([Type.Number({ exclusiveMinimum: 0 }), Type.String()])),
  },
  { additionalProperties: false },
);
