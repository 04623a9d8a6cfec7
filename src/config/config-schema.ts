import { z } from "zod";

const port = z.number().int().min(0).max(65535);

export const logLevelNameSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

export const serviceConfigSchema = z.object({
  name: z.string().trim().min(1),

  log: z
    .object({
      level: logLevelNameSchema.optional(),
      // Absent means console output.
      path: z.string().trim().min(1).optional(),
      // 0 disables buffering.
      bufferSize: z.number().int().min(0).optional(),
    })
    .optional(),

  metrics: z
    .object({
      port: port.optional(),
      host: z.string().min(1).optional(),
      prefix: z
        .string()
        .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, "must be a valid Prometheus name")
        .optional(),
      defaultLabels: z.record(z.string()).optional(),
    })
    .optional(),
});

/** Environment overrides. Values arrive as strings and are coerced. */
export const serviceEnvSchema = z.object({
  SERVICE_NAME: z.string().optional(),
  LOG_LEVEL: z.string().toLowerCase().pipe(logLevelNameSchema).optional(),
  LOG_PATH: z.string().optional(),
  LOG_BUFFER_SIZE: z.coerce.number().int().min(0).optional(),
  METRICS_PORT: z.coerce.number().pipe(port).optional(),
  METRICS_HOST: z.string().optional(),
  METRICS_PREFIX: z.string().optional(),
});
