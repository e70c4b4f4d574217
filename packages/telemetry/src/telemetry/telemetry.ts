/**
 * Telemetry — owns the listener that exposes the metrics endpoint.
 *
 * `start()` and `stop()` may be called any number of times, concurrently
 * with each other and with the background serving task. The listener
 * handle and the activation flag live in one state record that is only
 * replaced inside the lock, so callers never observe one without the other.
 *
 * `stop()` marks the manager inactive *before* closing the listener. The
 * serving task re-checks ownership under the same lock once the listener
 * closes, so an intentional stop is always told apart from a listener that
 * died on its own.
 */

import { Registry, collectDefaultMetrics } from "prom-client";
import type { FastifyPluginAsync } from "fastify";
import type {
  BindAddress,
  ServiceDefinition,
  TelemetryConfig,
} from "@telemetry-endpoint/shared";
import { decodeTelemetryConfig } from "../config/decode.js";
import { resolveInterfaceIp, type InterfaceTable } from "../config/interfaces.js";
import { createLogger, type Logger } from "../logger.js";
import { metricsRoutes } from "../routes/metrics.js";
import { createSensors, type CheckRunner, type Sensor } from "../sensors/index.js";
import {
  BindError,
  CloseError,
  ExpectedCloseError,
  UnexpectedServeError,
  type TelemetryError,
} from "./errors.js";
import { fastifyBinder, formatAddress, type Binder, type Listener } from "./listener.js";
import { StateLock } from "./state-lock.js";

/** Receives conditions the process cannot recover from */
export type FatalHandler = (error: TelemetryError) => void;

export interface TelemetryOptions {
  /** Registry served by the endpoint (default: a new registry) */
  registry?: Registry;
  /**
   * Collect the process-intrinsic metrics into the registry.
   * Defaults to true when the registry is created here.
   */
  collectDefaultMetrics?: boolean;
  logger?: Logger;
  /** Called on fatal errors (default: log at fatal and exit the process) */
  onFatal?: FatalHandler;
  /** Override how listeners are bound (for testing) */
  binder?: Binder;
  /** Override the network interface table (for testing) */
  interfaces?: InterfaceTable;
  /** Override how sensor checks run (for testing) */
  runCheck?: CheckRunner;
}

type ListenerState =
  | { readonly active: true; readonly listener: Listener }
  // A failed close leaves the listener reference behind
  | { readonly active: false; readonly listener: Listener | null };

const INACTIVE: ListenerState = { active: false, listener: null };

function exitOnFatal(logger: Logger): FatalHandler {
  return (error) => {
    logger.fatal({ err: error }, error.message);
    process.exit(1);
  };
}

export class Telemetry {
  readonly config: TelemetryConfig;
  readonly address: BindAddress;
  readonly registry: Registry;
  readonly sensors: Sensor[];

  private readonly router: FastifyPluginAsync;
  private readonly binder: Binder;
  private readonly onFatal: FatalHandler;
  private readonly logger: Logger;
  private readonly lock = new StateLock();
  private state: ListenerState = INACTIVE;
  private serving: Promise<void> = Promise.resolve();

  /**
   * Throws ConfigError for invalid configuration or an unresolvable
   * interface, and CollectorError when a sensor cannot be built.
   * Nothing is bound until `start()`.
   */
  constructor(raw: unknown, options: TelemetryOptions = {}) {
    this.logger = options.logger ?? createLogger();
    this.config = decodeTelemetryConfig(raw);
    this.address = {
      host: resolveInterfaceIp(this.config.interfaces, options.interfaces),
      port: this.config.port,
    };

    this.registry = options.registry ?? new Registry();
    this.router = metricsRoutes({ path: this.config.path, registry: this.registry });

    // Before sensors, so a sensor clashing with a process metric fails
    // inside the batch as a CollectorError
    if (options.collectDefaultMetrics ?? !options.registry) {
      collectDefaultMetrics({ register: this.registry });
    }

    // No sensors is fine: the registry still carries the process metrics
    this.sensors = this.config.sensors
      ? createSensors(this.config.sensors, {
          registry: this.registry,
          logger: this.logger,
          runCheck: options.runCheck,
        })
      : [];

    this.binder =
      options.binder ??
      fastifyBinder({
        router: this.router,
        logger: this.logger.child({ component: "telemetry" }),
      });
    this.onFatal = options.onFatal ?? exitOnFatal(this.logger);
  }

  /** Whether the endpoint is currently serving */
  isActive(): boolean {
    return this.state.active;
  }

  /** Address of the active listener, or null when inactive */
  get listenAddress(): string | null {
    return this.state.active ? this.state.listener.address : null;
  }

  /**
   * Bind the listener and start serving. No-op when already active.
   * A bind failure is fatal.
   */
  async start(): Promise<void> {
    if (this.isActive()) {
      this.logger.debug(`telemetry: Already listening on ${this.describeAddress()}`);
      return;
    }

    await this.lock.run(async () => {
      if (this.state.active) return; // a concurrent start() won

      let listener: Listener;
      try {
        listener = await this.binder(this.address);
      } catch (err) {
        this.onFatal(new BindError(this.describeAddress(), { cause: err }));
        return;
      }

      this.state = { active: true, listener };
      this.serving = this.serve(listener).catch((err: unknown) => {
        this.logger.error({ err }, "telemetry: serving task failed");
      });
    });
  }

  /**
   * Close the listener. No-op when inactive.
   * A close failure is logged; the manager still reports inactive.
   */
  async stop(): Promise<void> {
    await this.lock.run(async () => {
      if (!this.state.active) return;

      const { listener } = this.state;
      this.logger.debug(`telemetry: Shutdown listener ${listener.address}`);

      // Must flip before close: the serving task checks this once close lands
      this.state = { active: false, listener };

      try {
        await listener.close();
      } catch (err) {
        const error = new CloseError(listener.address, { cause: err });
        this.logger.error({ err: error }, `telemetry: ${error.message}`);
        return;
      }
      this.state = INACTIVE;
    });
  }

  /** Resolves once the latest activation's serving task has finished */
  whenStopped(): Promise<void> {
    return this.serving;
  }

  /** Data a discovery backend needs to advertise this endpoint */
  serviceDefinition(): ServiceDefinition {
    return {
      name: this.config.serviceName,
      ipAddress: this.address.host,
      port: this.address.port,
      path: this.config.path,
      ttl: this.config.ttl,
      poll: this.config.poll,
      tags: [...this.config.tags],
    };
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  /** Background serving task for one activation */
  private async serve(listener: Listener): Promise<void> {
    if (!(await this.lock.run(() => this.owns(listener)))) {
      this.logger.debug("telemetry: Is not listening");
      return;
    }

    this.logger.debug(`telemetry: Listening on ${listener.address}`);
    let cause: unknown;
    let failed = false;
    try {
      await listener.serve();
    } catch (err) {
      failed = true;
      cause = err;
    }

    const died = await this.lock.run(() => {
      if (!this.owns(listener)) return false;
      // Dead listener: let a later start() bind again
      this.state = INACTIVE;
      return true;
    });
    if (!died) {
      const expected = new ExpectedCloseError(failed ? { cause } : undefined);
      this.logger.debug(
        { reason: expected.message },
        `telemetry: Stopped listening on ${listener.address}`,
      );
      return;
    }

    this.onFatal(new UnexpectedServeError(listener.address, failed ? { cause } : undefined));
  }

  private owns(listener: Listener): boolean {
    return this.state.active && this.state.listener === listener;
  }

  private describeAddress(): string {
    return formatAddress(this.address.host, this.address.port);
  }
}
