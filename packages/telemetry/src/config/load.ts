import { readFile } from "node:fs/promises";
import { ConfigError } from "../telemetry/errors.js";

/**
 * Read the raw telemetry configuration from a JSON file.
 * A `PORT` entry in `env` overrides the file's port.
 * Decoding and validation happen when the Telemetry is constructed.
 */
export async function loadTelemetryConfig(
  path: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`Unable to read telemetry configuration ${path}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Telemetry configuration ${path} is not valid JSON`, { cause: err });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Telemetry configuration ${path} must be a JSON object`);
  }

  const raw: Record<string, unknown> = { ...parsed };
  if (env.PORT) {
    const port = Number(env.PORT);
    if (!Number.isInteger(port)) {
      throw new ConfigError(`PORT must be an integer, got ${JSON.stringify(env.PORT)}`);
    }
    raw.port = port;
  }
  return raw;
}
