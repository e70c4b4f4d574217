import { describe, it, expect } from "vitest";
import { decodeSensorConfig, decodeTelemetryConfig } from "./decode.js";
import { ConfigError } from "../telemetry/errors.js";

// ---------------------------------------------------------------------------
// decodeTelemetryConfig
// ---------------------------------------------------------------------------

describe("decodeTelemetryConfig", () => {
  it("applies defaults to an empty config", () => {
    expect(decodeTelemetryConfig({})).toEqual({
      port: 9090,
      interfaces: [],
      tags: [],
      serviceName: "telemetry",
      path: "/metrics",
      ttl: 15,
      poll: 5,
    });
  });

  it("treats a missing config as empty", () => {
    expect(decodeTelemetryConfig(undefined).port).toBe(9090);
  });

  it("keeps overrides and passes sensors through", () => {
    const sensors = [{ name: "x" }];
    const config = decodeTelemetryConfig({
      port: 8000,
      interfaces: "eth0",
      tags: ["a", "b"],
      sensors,
      serviceName: "node-metrics",
      path: "/prom",
      ttl: 30,
      poll: 10,
    });

    expect(config).toEqual({
      port: 8000,
      interfaces: ["eth0"],
      tags: ["a", "b"],
      sensors,
      serviceName: "node-metrics",
      path: "/prom",
      ttl: 30,
      poll: 10,
    });
  });

  it("does not mutate the raw input", () => {
    const raw = { port: 9100 };
    decodeTelemetryConfig(raw);
    expect(raw).toEqual({ port: 9100 });
  });

  it("rejects unknown keys", () => {
    expect(() => decodeTelemetryConfig({ prot: 9090 })).toThrow(ConfigError);
  });

  it("rejects a non-object config", () => {
    expect(() => decodeTelemetryConfig([9090])).toThrow(
      "Telemetry configuration error: expected an object",
    );
  });

  it("rejects an out-of-range port", () => {
    expect(() => decodeTelemetryConfig({ port: 70000 })).toThrow(/\/port/);
  });

  it("rejects a path without a leading slash", () => {
    expect(() => decodeTelemetryConfig({ path: "metrics" })).toThrow(/\/path/);
  });
});

// ---------------------------------------------------------------------------
// decodeSensorConfig
// ---------------------------------------------------------------------------

describe("decodeSensorConfig", () => {
  const valid = {
    name: "queue_depth",
    help: "Jobs waiting",
    type: "gauge",
    interval: 5,
    check: "/bin/queue-depth",
  };

  it("accepts a complete sensor", () => {
    expect(decodeSensorConfig(valid)).toEqual(valid);
  });

  it("rejects an unknown type", () => {
    expect(() => decodeSensorConfig({ ...valid, type: "meter" })).toThrow(/\/type/);
  });

  it("rejects a missing check", () => {
    const { check: _check, ...rest } = valid;
    expect(() => decodeSensorConfig(rest)).toThrow(/\/check/);
  });

  it("rejects a non-object", () => {
    expect(() => decodeSensorConfig("queue_depth")).toThrow("expected an object");
  });
});
