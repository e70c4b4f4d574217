import { createLogger } from "./logger.js";
import { loadTelemetryConfig, Telemetry } from "./telemetry/index.js";

const logger = createLogger();
const configPath = process.env.TELEMETRY_CONFIG || "telemetry.json";

let telemetry: Telemetry;
try {
  telemetry = new Telemetry(await loadTelemetryConfig(configPath), { logger });
} catch (err) {
  logger.error({ err }, "telemetry: configuration failed");
  process.exit(1);
}

for (const sensor of telemetry.sensors) sensor.start();
await telemetry.start();
logger.info(`Telemetry listening on ${telemetry.listenAddress ?? "(not bound)"}${telemetry.config.path}`);

// Shutdown
async function shutdown(signal: string) {
  logger.info(`Received ${signal}, shutting down`);
  for (const sensor of telemetry.sensors) sensor.stop();
  await telemetry.stop();
  await telemetry.whenStopped();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "telemetry: shutdown failed");
      process.exit(1);
    });
  });
}
