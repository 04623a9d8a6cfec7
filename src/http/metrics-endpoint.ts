import type { IncomingMessage, ServerResponse } from "node:http";
import type { MetricsSource } from "../interfaces/metrics.js";

export async function handleMetrics(
  _req: IncomingMessage,
  res: ServerResponse,
  source: MetricsSource,
): Promise<void> {
  const output = await source.getMetricsOutput();
  res.writeHead(200, { "Content-Type": source.contentType });
  res.end(output);
}
