import { describe, it, expect, afterEach } from "vitest";
import { createServer, type Server } from "node:net";
import { pino } from "pino";
import type { FastifyPluginAsync } from "fastify";
import { fastifyBinder, formatAddress } from "./listener.js";

const logger = pino({ level: "silent" });

let blocker: Server | undefined;

afterEach(async () => {
  const server = blocker;
  blocker = undefined;
  if (server) {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
});

/** Occupy a loopback port and return it */
async function occupyPort(): Promise<number> {
  const server = createServer();
  blocker = server;
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const addr = server.address();
  return typeof addr === "object" && addr ? addr.port : 0;
}

describe("formatAddress", () => {
  it("brackets IPv6 hosts", () => {
    expect(formatAddress("127.0.0.1", 9090)).toBe("127.0.0.1:9090");
    expect(formatAddress("::1", 9090)).toBe("[::1]:9090");
  });
});

describe("fastifyBinder", () => {
  it("closes the app when the port is taken", async () => {
    const port = await occupyPort();
    let closed = 0;
    const router: FastifyPluginAsync = async (app) => {
      app.addHook("onClose", async () => {
        closed++;
      });
    };
    const bind = fastifyBinder({ router, logger });

    await expect(bind({ host: "127.0.0.1", port })).rejects.toThrow(/EADDRINUSE/);
    expect(closed).toBe(1);
  });

  it("reports the bound address and settles serve() on close", async () => {
    const bind = fastifyBinder({ router: async () => {}, logger });
    const listener = await bind({ host: "127.0.0.1", port: 0 });

    expect(listener.address).toMatch(/^127\.0\.0\.1:\d+$/);
    const served = listener.serve();
    await listener.close();
    await expect(served).resolves.toBeUndefined();
  });
});
