import type { z } from "zod";
import { serviceConfigSchema, type logLevelNameSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";

export type LogLevelName = z.infer<typeof logLevelNameSchema>;

export type ServiceConfig = z.input<typeof serviceConfigSchema>;

/** Fully resolved configuration with defaults applied. */
export type ResolvedServiceConfig = {
  name: string;
  log: {
    level: LogLevelName;
    path?: string;
    bufferSize: number;
  };
  metrics: {
    port: number;
    host: string;
    prefix?: string;
    defaultLabels: Record<string, string>;
  };
};

export const DEFAULT_CONFIG: Omit<ResolvedServiceConfig, "name"> = {
  log: {
    level: "info",
    bufferSize: 0,
  },
  metrics: {
    port: 9464,
    host: "0.0.0.0",
    defaultLabels: {},
  },
};

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Record<string, unknown> ? DeepPartial<T[K]> : T[K];
};

/** Deep merge objects, with user config taking precedence over defaults. */
function deepMerge<T extends Record<string, unknown>>(defaults: T, userConfig?: DeepPartial<T>): T {
  if (!userConfig) return defaults;

  const result = { ...defaults };
  for (const key in userConfig) {
    const userValue = userConfig[key];
    const defaultValue = defaults[key];
    if (userValue === undefined) continue;

    // Recursively merge nested objects
    if (
      typeof userValue === "object" &&
      userValue !== null &&
      !Array.isArray(userValue) &&
      defaultValue &&
      typeof defaultValue === "object" &&
      !Array.isArray(defaultValue)
    ) {
      result[key] = deepMerge(
        defaultValue as Record<string, unknown>,
        userValue as Record<string, unknown>,
      ) as T[Extract<keyof T, string>];
    } else {
      result[key] = userValue as T[Extract<keyof T, string>];
    }
  }
  return result;
}

export function resolveConfig(config: ServiceConfig): ResolvedServiceConfig {
  return parseConfig(config);
}

/** Validate untyped input, such as parsed JSON, and apply defaults. */
export function parseConfig(input: unknown): ResolvedServiceConfig {
  const validation = serviceConfigSchema.safeParse(input);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const { name, ...rest } = validation.data;
  return { name, ...deepMerge(DEFAULT_CONFIG, rest) };
}
