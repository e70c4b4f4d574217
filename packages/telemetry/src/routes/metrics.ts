/**
 * Metrics exposition route: the single route served by the telemetry
 * listener. Renders the owned registry in the Prometheus text format.
 */

import type { FastifyPluginAsync } from "fastify";
import type { Registry } from "prom-client";
import { ConfigError } from "../telemetry/errors.js";

export interface MetricsRoutesOptions {
  /** URL path, e.g. "/metrics" */
  path: string;
  registry: Registry;
}

const VALID_PATH = /^\/[^\s?#]*$/;

/**
 * Build the metrics route plugin. Built once per Telemetry and registered
 * on every listener it binds.
 */
export function metricsRoutes({ path, registry }: MetricsRoutesOptions): FastifyPluginAsync {
  if (!VALID_PATH.test(path)) {
    throw new ConfigError(`Invalid metrics path: ${JSON.stringify(path)}`);
  }

  return async (app) => {
    app.get(path, async (_request, reply) => {
      const body = await registry.metrics();
      return reply.header("content-type", registry.contentType).send(body);
    });
  };
}
