import { describe, it, expect, afterEach } from "vitest";
import { pino } from "pino";
import { Counter, Registry } from "prom-client";
import { buildApp } from "../app.js";
import { metricsRoutes } from "./metrics.js";
import { ConfigError } from "../telemetry/errors.js";

const logger = pino({ level: "silent" });

let app: Awaited<ReturnType<typeof buildApp>> | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

async function build(registry: Registry, path = "/metrics") {
  const built = await buildApp({ router: metricsRoutes({ path, registry }), logger });
  app = built;
  return built;
}

describe("metricsRoutes", () => {
  it("serves the registry on the configured path", async () => {
    const registry = new Registry();
    const requests = new Counter({
      name: "jobs_total",
      help: "Jobs processed",
      registers: [registry],
    });
    requests.inc(4);

    const res = await (await build(registry, "/prom")).inject({ method: "GET", url: "/prom" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe(registry.contentType);
    expect(res.body).toContain("# TYPE jobs_total counter");
    expect(res.body).toContain("jobs_total 4");
  });

  it("returns 404 for any other path", async () => {
    const res = await (await build(new Registry())).inject({ method: "GET", url: "/other" });
    expect(res.statusCode).toBe(404);
  });

  it("returns 500 when a collector fails", async () => {
    const registry = new Registry();
    new Counter({
      name: "broken_total",
      help: "Always fails",
      registers: [registry],
      collect() {
        throw new Error("collector exploded");
      },
    });

    const res = await (await build(registry)).inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "Internal server error" });
  });

  it("rejects a path that cannot be routed", () => {
    expect(() => metricsRoutes({ path: "metrics", registry: new Registry() })).toThrow(ConfigError);
    expect(() => metricsRoutes({ path: "/a b", registry: new Registry() })).toThrow(ConfigError);
  });
});
