/**
 * Listener — one bound, serving network endpoint.
 *
 * The lifecycle manager only talks to this interface, so the HTTP stack
 * can be swapped for a fake in tests.
 */

import type { AddressInfo } from "node:net";
import type { BindAddress } from "@telemetry-endpoint/shared";
import { buildApp, type BuildAppOptions } from "../app.js";

export interface Listener {
  /** Address actually bound, as host:port */
  readonly address: string;
  /**
   * Settles once the listener stops accepting connections:
   * resolves when it closes, rejects when the server errors.
   */
  serve(): Promise<void>;
  /** Close the listener; rejects when the close fails */
  close(): Promise<void>;
}

/** Binds a new listener to an address */
export type Binder = (address: BindAddress) => Promise<Listener>;

export function formatAddress(host: string, port: number): string {
  return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`;
}

function describeBound(bound: AddressInfo | string | null, fallback: BindAddress): string {
  if (bound === null) return formatAddress(fallback.host, fallback.port);
  if (typeof bound === "string") return bound;
  return formatAddress(bound.address, bound.port);
}

/** Bind listeners as Fastify servers serving `router` */
export function fastifyBinder(options: BuildAppOptions): Binder {
  return async (address) => {
    const app = await buildApp(options);
    try {
      await app.listen({ host: address.host, port: address.port });
    } catch (err) {
      await app.close();
      throw err;
    }
    const server = app.server;

    return {
      address: describeBound(server.address(), address),
      serve: () =>
        new Promise<void>((resolve, reject) => {
          if (!server.listening) {
            resolve();
            return;
          }
          const onClose = () => {
            server.off("error", onError);
            resolve();
          };
          const onError = (err: Error) => {
            server.off("close", onClose);
            reject(err);
          };
          server.once("close", onClose);
          server.once("error", onError);
        }),
      close: async () => {
        await app.close();
      },
    };
  };
}
