import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import { DEFAULT_CONFIG, parseConfig, resolveConfig } from "../types/config.js";
import { serviceEnvSchema } from "./config-schema.js";

describe("config validation", () => {
  it("applies defaults for omitted sections", () => {
    expect(resolveConfig({ name: "svc" })).toEqual({
      name: "svc",
      log: { level: "info", bufferSize: 0 },
      metrics: { port: 9464, host: "0.0.0.0", defaultLabels: {} },
    });
  });

  it("merges nested sections over the defaults", () => {
    const config = resolveConfig({
      name: "svc",
      log: { level: "debug", path: "/var/log/svc.log" },
      metrics: { prefix: "svc", defaultLabels: { env: "test" } },
    });

    expect(config.log).toEqual({ level: "debug", path: "/var/log/svc.log", bufferSize: 0 });
    expect(config.metrics).toEqual({
      port: 9464,
      host: "0.0.0.0",
      prefix: "svc",
      defaultLabels: { env: "test" },
    });
  });

  it("trims the service name", () => {
    expect(resolveConfig({ name: "  svc  " }).name).toBe("svc");
  });

  it("does not let explicit undefined erase a default", () => {
    expect(resolveConfig({ name: "svc", log: { level: undefined } }).log.level).toBe(
      DEFAULT_CONFIG.log.level,
    );
  });

  it("rejects a blank name", () => {
    expect(() => resolveConfig({ name: "   " })).toThrow("Invalid configuration");
  });

  it("rejects an unknown level name", () => {
    expect(() => parseConfig({ name: "svc", log: { level: "verbose" } })).toThrow(
      "Invalid configuration",
    );
  });

  it("rejects a negative buffer size", () => {
    expect(() => resolveConfig({ name: "svc", log: { bufferSize: -1 } })).toThrow(
      "Invalid configuration",
    );
  });

  it("rejects port above 65535", () => {
    expect(() => resolveConfig({ name: "svc", metrics: { port: 70000 } })).toThrow(
      "Invalid configuration",
    );
  });

  it("rejects a prefix that is not a Prometheus name", () => {
    expect(() => resolveConfig({ name: "svc", metrics: { prefix: "my-svc" } })).toThrow(
      "must be a valid Prometheus name",
    );
  });

  it("throws ConfigError with the zod error as cause", () => {
    let caught: unknown;
    try {
      parseConfig({});
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect((caught as ConfigError).code).toBe("CONFIG");
    expect((caught as ConfigError).cause).toBeDefined();
  });
});

describe("serviceEnvSchema", () => {
  it("coerces numeric variables and lowercases the level", () => {
    expect(
      serviceEnvSchema.parse({ LOG_LEVEL: "WARN", LOG_BUFFER_SIZE: "512", METRICS_PORT: "9100" }),
    ).toEqual({ LOG_LEVEL: "warn", LOG_BUFFER_SIZE: 512, METRICS_PORT: 9100 });
  });

  it("rejects a non-numeric port", () => {
    expect(serviceEnvSchema.safeParse({ METRICS_PORT: "abc" }).success).toBe(false);
  });
});
