import {
  createServer as createHttpServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import { errorMessage } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { MetricsSource } from "../interfaces/metrics.js";
import { noopLogger } from "../utils/noop-logger.js";
import { handleMetrics } from "./metrics-endpoint.js";

export interface MetricsServerOptions {
  source: MetricsSource;
  port: number;
  host?: string;
  logger?: Logger;
}

export function createMetricsServer(source: MetricsSource, logger: Logger = noopLogger): Server {
  return createHttpServer((req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (url.pathname === "/metrics" && (req.method === "GET" || req.method === "HEAD")) {
      handleMetrics(req, res, source).catch((err: unknown) => {
        logger.error("Error collecting metrics", { error: errorMessage(err) });
        if (!res.headersSent) res.writeHead(500, { "Content-Type": "text/plain" });
        res.end("Internal Server Error");
      });
      return;
    }

    res.writeHead(404);
    res.end("Not Found");
  });
}

/**
 * Serve `GET /metrics` on `port`. Resolves once listening; a listen failure is
 * logged at error level and rejects.
 */
export async function startMetricsServer(options: MetricsServerOptions): Promise<Server> {
  const logger = options.logger ?? noopLogger;
  const server = createMetricsServer(options.source, logger);

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      logger.error(`Error starting Prometheus metrics server: ${err.message}`);
      reject(err);
    };
    server.once("error", onError);
    server.listen(options.port, options.host, () => {
      server.off("error", onError);
      const address = server.address();
      const port = address !== null && typeof address === "object" ? address.port : options.port;
      logger.info("Prometheus metrics server listening", { port });
      resolve();
    });
  });

  return server;
}
