/**
 * Sensor — a metric in the telemetry registry fed by an external check.
 *
 * On every poll the sensor runs its check command and records the trimmed
 * stdout, parsed as a float, into its metric:
 *   counter   → inc(value)
 *   gauge     → set(value)
 *   histogram → observe(value)
 *   summary   → observe(value)
 *
 * IMPORTANT: Like the listener itself, this module knows nothing about the
 * HTTP layer. It only writes into the registry it was given.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { Counter, Gauge, Histogram, Summary, type Registry } from "prom-client";
import type { SensorConfig, SensorType } from "@telemetry-endpoint/shared";
import type { Logger } from "../logger.js";

const execFileAsync = promisify(execFile);

/** Runs a check command and resolves with its stdout */
export type CheckRunner = (argv: string[], timeoutMs: number) => Promise<string>;

export interface SensorOptions {
  /** Registry the sensor's metric is registered in */
  registry: Registry;
  logger: Logger;
  /** Override how checks are executed (for testing) */
  runCheck?: CheckRunner;
}

type Recorder = (value: number) => void;

export const runCheckCommand: CheckRunner = async (argv, timeoutMs) => {
  const [file, ...args] = argv;
  const { stdout } = await execFileAsync(file, args, { timeout: timeoutMs });
  return stdout;
};

/** Parse a timeout: a number of seconds, or "250ms" / "5s" / "1m" / "1h" */
export function parseDuration(value: number | string): number {
  if (typeof value === "number") return value * 1000;
  const match = /^(\d+(?:\.\d+)?)(ms|s|m|h)?$/.exec(value.trim());
  if (!match) {
    throw new Error(`unable to parse duration: ${value}`);
  }
  const amount = Number(match[1]);
  switch (match[2]) {
    case "ms":
      return amount;
    case "m":
      return amount * 60_000;
    case "h":
      return amount * 3_600_000;
    default:
      return amount * 1000;
  }
}

/** Join the non-empty name parts with underscores */
export function fullMetricName(config: Pick<SensorConfig, "namespace" | "subsystem" | "name">): string {
  return [config.namespace, config.subsystem, config.name]
    .filter((part): part is string => !!part)
    .join("_");
}

/** Register the metric and return how a value is recorded into it */
function createRecorder(
  type: SensorType,
  name: string,
  help: string,
  registry: Registry,
): Recorder {
  const opts = { name, help, registers: [registry] };
  switch (type) {
    case "counter": {
      const counter = new Counter(opts);
      return (value) => counter.inc(value);
    }
    case "gauge": {
      const gauge = new Gauge(opts);
      return (value) => gauge.set(value);
    }
    case "histogram": {
      const histogram = new Histogram(opts);
      return (value) => histogram.observe(value);
    }
    case "summary": {
      const summary = new Summary(opts);
      return (value) => summary.observe(value);
    }
  }
}

export class Sensor {
  readonly name: string;
  readonly type: SensorType;
  readonly intervalMs: number;
  readonly timeoutMs: number;

  private argv: string[];
  private recorder: Recorder;
  private logger: Logger;
  private runCheck: CheckRunner;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight = false;

  constructor(config: SensorConfig, options: SensorOptions) {
    this.name = fullMetricName(config);
    this.type = config.type;
    this.intervalMs = config.interval * 1000;
    this.timeoutMs =
      config.timeout === undefined ? this.intervalMs : parseDuration(config.timeout);
    if (!(this.timeoutMs > 0)) {
      throw new Error(`timeout must be positive: ${String(config.timeout)}`);
    }
    this.argv =
      typeof config.check === "string" ? config.check.trim().split(/\s+/) : [...config.check];
    this.logger = options.logger.child({ sensor: this.name });
    this.runCheck = options.runCheck ?? runCheckCommand;

    // Registers with the registry; throws on an invalid or duplicate name
    this.recorder = createRecorder(config.type, this.name, config.help, options.registry);
  }

  /** Start the polling loop */
  start(): void {
    if (this.timer) return; // already running
    this.timer = setInterval(() => {
      this.poll().catch((err: unknown) => {
        this.logger.error({ err }, "sensor poll failed");
      });
    }, this.intervalMs);
  }

  /** Stop the polling loop */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Whether the polling loop is currently running */
  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Run the check once and record its output.
   * Check failures and unusable output are logged, never thrown.
   */
  async poll(): Promise<void> {
    if (this.inFlight) return; // previous check still running
    this.inFlight = true;
    try {
      let output: string;
      try {
        output = await this.runCheck(this.argv, this.timeoutMs);
      } catch (err) {
        this.logger.error({ err }, "sensor check failed");
        return;
      }

      const text = output.trim();
      const value = Number(text);
      if (text === "" || Number.isNaN(value)) {
        this.logger.error({ output: text }, "sensor check produced non-numeric output");
        return;
      }

      try {
        this.record(value);
      } catch (err) {
        this.logger.error({ err, value }, "sensor could not record value");
      }
    } finally {
      this.inFlight = false;
    }
  }

  /** Record one observed value into the metric */
  record(value: number): void {
    this.recorder(value);
    this.logger.debug({ value }, "sensor recorded value");
  }
}
