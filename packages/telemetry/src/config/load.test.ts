import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadTelemetryConfig } from "./load.js";
import { ConfigError } from "../telemetry/errors.js";

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "telemetry-config-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function configFile(name: string, contents: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, contents);
  return path;
}

describe("loadTelemetryConfig", () => {
  it("reads the raw JSON object", async () => {
    const path = await configFile("plain.json", '{"port": 9100, "tags": ["a"]}');
    await expect(loadTelemetryConfig(path, {})).resolves.toEqual({ port: 9100, tags: ["a"] });
  });

  it("lets PORT override the file", async () => {
    const path = await configFile("override.json", '{"port": 9100}');
    await expect(loadTelemetryConfig(path, { PORT: "9200" })).resolves.toEqual({ port: 9200 });
  });

  it("rejects a non-integer PORT", async () => {
    const path = await configFile("bad-port.json", "{}");
    await expect(loadTelemetryConfig(path, { PORT: "http" })).rejects.toThrow(
      'PORT must be an integer, got "http"',
    );
  });

  it("rejects invalid JSON", async () => {
    const path = await configFile("broken.json", "{port:");
    await expect(loadTelemetryConfig(path, {})).rejects.toThrow(ConfigError);
  });

  it("rejects a JSON array", async () => {
    const path = await configFile("array.json", "[]");
    await expect(loadTelemetryConfig(path, {})).rejects.toThrow("must be a JSON object");
  });

  it("rejects a missing file", async () => {
    await expect(loadTelemetryConfig(join(dir, "missing.json"), {})).rejects.toThrow(
      /Unable to read telemetry configuration/,
    );
  });
});
