import type { AddressInfo } from "node:net";
import type { Server } from "node:http";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { MetricsSource } from "../interfaces/metrics.js";
import { startMetricsServer } from "./metrics-server.js";

// ---- Helpers ----

function fakeLogger() {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  };
}

function staticSource(output: string): MetricsSource {
  return {
    contentType: "text/plain; version=0.0.4; charset=utf-8",
    getMetricsOutput: async () => output,
  };
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

function baseUrl(server: Server): string {
  const { port } = server.address() as AddressInfo;
  return `http://127.0.0.1:${port}`;
}

// ---- Tests ----

describe("startMetricsServer", () => {
  const servers: Server[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map(closeServer));
  });

  it("serves the source output on GET /metrics", async () => {
    const server = await startMetricsServer({
      source: staticSource("jobs_total 3\n"),
      port: 0,
      host: "127.0.0.1",
    });
    servers.push(server);

    const res = await fetch(`${baseUrl(server)}/metrics`);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/plain; version=0.0.4; charset=utf-8");
    expect(await res.text()).toBe("jobs_total 3\n");
  });

  it("returns 404 for any other path", async () => {
    const server = await startMetricsServer({
      source: staticSource(""),
      port: 0,
      host: "127.0.0.1",
    });
    servers.push(server);

    const res = await fetch(`${baseUrl(server)}/health`);

    expect(res.status).toBe(404);
    expect(await res.text()).toBe("Not Found");
  });

  it("returns 500 and logs when collection fails", async () => {
    const logger = fakeLogger();
    const source: MetricsSource = {
      contentType: "text/plain",
      getMetricsOutput: () => Promise.reject(new Error("collect failed")),
    };
    const server = await startMetricsServer({ source, port: 0, host: "127.0.0.1", logger });
    servers.push(server);

    const res = await fetch(`${baseUrl(server)}/metrics`);

    expect(res.status).toBe(500);
    expect(await res.text()).toBe("Internal Server Error");
    expect(logger.error).toHaveBeenCalledWith("Error collecting metrics", {
      error: "collect failed",
    });
  });

  it("logs and rejects when the port is already taken", async () => {
    const first = await startMetricsServer({
      source: staticSource(""),
      port: 0,
      host: "127.0.0.1",
    });
    servers.push(first);
    const { port } = first.address() as AddressInfo;
    const logger = fakeLogger();

    await expect(
      startMetricsServer({ source: staticSource(""), port, host: "127.0.0.1", logger }),
    ).rejects.toThrow(/EADDRINUSE/);

    expect(logger.error).toHaveBeenCalledTimes(1);
    const [message] = logger.error.mock.calls[0];
    expect(message).toMatch(/^Error starting Prometheus metrics server: .*EADDRINUSE/);
  });

  it("logs the bound port at info", async () => {
    const logger = fakeLogger();
    const server = await startMetricsServer({
      source: staticSource(""),
      port: 0,
      host: "127.0.0.1",
      logger,
    });
    servers.push(server);

    const { port } = server.address() as AddressInfo;
    expect(port).toBeGreaterThan(0);
    expect(logger.info).toHaveBeenCalledWith("Prometheus metrics server listening", { port });
  });
});
