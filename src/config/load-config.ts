import { readFileSync } from "node:fs";
import * as dotenv from "dotenv";
import { ConfigError, errorMessage } from "../errors.js";
import { parseConfig, type ResolvedServiceConfig } from "../types/config.js";
import { serviceEnvSchema } from "./config-schema.js";

export interface LoadConfigOptions {
  /** JSON file holding a service config object. */
  configPath?: string;
  /** dotenv file. Variables already present in `env` win over its values. */
  envFile?: string;
  /** Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

const ENV_KEYS = Object.keys(serviceEnvSchema.shape);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readFile(path: string, kind: string): string {
  try {
    return readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Failed to read ${kind} "${path}": ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

function readJsonConfig(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFile(path, "config file"));
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`Malformed JSON in config file "${path}": ${errorMessage(err)}`, {
      cause: err,
    });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file "${path}" must contain a JSON object`);
  }
  return parsed;
}

// The first source holding a non-empty value for a key wins.
function envOverrides(sources: readonly NodeJS.ProcessEnv[]) {
  const present = Object.fromEntries(
    ENV_KEYS.flatMap((key) => {
      const value = sources.map((source) => source[key]).find((v) => v !== undefined && v !== "");
      return value === undefined ? [] : [[key, value]];
    }),
  );
  const validation = serviceEnvSchema.safeParse(present);
  if (!validation.success) {
    throw new ConfigError(`Invalid environment: ${validation.error.message}`, {
      cause: validation.error,
    });
  }
  return validation.data;
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

// Non-object sections are left for schema validation to reject.
function overlay(base: unknown, overrides: Record<string, unknown>): unknown {
  if (Object.keys(overrides).length === 0) return base;
  if (base === undefined) return overrides;
  return isRecord(base) ? { ...base, ...overrides } : base;
}

/**
 * Build the service config from, in increasing precedence: defaults, the JSON
 * file, the dotenv file and the environment.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedServiceConfig {
  const fileConfig = options.configPath ? readJsonConfig(options.configPath) : {};
  const dotenvValues = options.envFile ? dotenv.parse(readFile(options.envFile, "env file")) : {};
  const env = envOverrides([options.env ?? process.env, dotenvValues]);

  const config = {
    ...fileConfig,
    ...withoutUndefined({ name: env.SERVICE_NAME }),
    log: overlay(
      fileConfig.log,
      withoutUndefined({
        level: env.LOG_LEVEL,
        path: env.LOG_PATH,
        bufferSize: env.LOG_BUFFER_SIZE,
      }),
    ),
    metrics: overlay(
      fileConfig.metrics,
      withoutUndefined({
        port: env.METRICS_PORT,
        host: env.METRICS_HOST,
        prefix: env.METRICS_PREFIX,
      }),
    ),
  };
  return parseConfig(config);
}
