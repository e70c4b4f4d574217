/**
 * Sensors Module
 *
 * Builds sensors from raw configuration. Any failure aborts the whole batch
 * with a CollectorError and unregisters the metrics already created.
 */

import { decodeSensorConfig } from "../config/decode.js";
import { CollectorError } from "../telemetry/errors.js";
import { Sensor, type SensorOptions } from "./sensor.js";

export function createSensors(raws: unknown[], options: SensorOptions): Sensor[] {
  const sensors: Sensor[] = [];
  raws.forEach((raw, index) => {
    try {
      sensors.push(new Sensor(decodeSensorConfig(raw), options));
    } catch (err) {
      for (const sensor of sensors) {
        options.registry.removeSingleMetric(sensor.name);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new CollectorError(`Sensor configuration error in sensors[${index}]: ${reason}`, {
        cause: err,
      });
    }
  });
  return sensors;
}

export { Sensor, parseDuration, fullMetricName, runCheckCommand } from "./sensor.js";
export type { CheckRunner, SensorOptions } from "./sensor.js";
