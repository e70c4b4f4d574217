import Fastify, { type FastifyError, type FastifyPluginAsync } from "fastify";
import type { Logger } from "./logger.js";

export interface BuildAppOptions {
  /** Route plugin serving the metrics path */
  router: FastifyPluginAsync;
  logger: Logger;
}

/**
 * Build the Fastify application for one listener activation.
 * Exported separately from binding so tests can use `app.inject()`.
 */
export async function buildApp({ router, logger }: BuildAppOptions) {
  const app = Fastify({
    loggerInstance: logger,
    // Scrapes arrive every few seconds; don't log each one
    disableRequestLogging: true,
  });

  // ---------------------------------------------------------------------------
  // Global error handler: collector failures become a generic 500
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, "metrics request failed");
    reply.status(error.statusCode ?? 500).send({
      error: error.statusCode && error.statusCode < 500 ? error.message : "Internal server error",
    });
  });

  await app.register(router);

  return app;
}
