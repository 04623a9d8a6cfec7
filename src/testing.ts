/**
 * Test utilities, exported from the `"service-kit/testing"` entry point.
 */
export { MemorySink } from "./testing/memory-sink.js";
export type {
  MockHttpResponse,
  MockRequestOptions,
  MockRequestResult,
} from "./testing/mock-http-server.js";
export { MockHttpServer } from "./testing/mock-http-server.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
