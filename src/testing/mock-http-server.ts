import {
  createServer,
  type IncomingHttpHeaders,
  type IncomingMessage,
  request as httpRequest,
  type Server,
  type ServerResponse,
} from "node:http";

export interface MockHttpResponse {
  status: number;
  body: Uint8Array;
}

export interface MockRequestOptions {
  method?: string;
  body?: string | Uint8Array;
  headers?: Record<string, string>;
}

export interface MockRequestResult {
  status: number;
  headers: IncomingHttpHeaders;
  body: string;
}

/**
 * In-process HTTP server answering from a table of canned responses keyed by
 * the exact request target. `request()` reaches it as a forward proxy, so code
 * under test can keep its absolute upstream URLs.
 */
export class MockHttpServer {
  readonly responses: Map<string, MockHttpResponse>;
  private readonly server: Server;
  private readonly port: number;

  private constructor(server: Server, port: number, responses: Map<string, MockHttpResponse>) {
    this.server = server;
    this.port = port;
    this.responses = responses;
  }

  static async start(): Promise<MockHttpServer> {
    const responses = new Map<string, MockHttpResponse>();
    const server = createServer((req: IncomingMessage, res: ServerResponse) => {
      // Drain the request body before answering.
      req.resume();
      req.on("end", () => {
        const found = responses.get(req.url ?? "");
        res.setHeader("Content-Type", "application/json");
        if (found) {
          res.writeHead(found.status);
          res.end(found.body);
        } else {
          res.writeHead(404);
          res.end();
        }
      });
    });

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(0, "127.0.0.1", () => {
        server.off("error", reject);
        resolve();
      });
    });

    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Mock HTTP server is not listening on a TCP port");
    }
    return new MockHttpServer(server, address.port, responses);
  }

  get url(): string {
    return `http://127.0.0.1:${this.port}`;
  }

  addTestData(url: string, status: number, body: string | Uint8Array): void {
    const bytes = typeof body === "string" ? Buffer.from(body, "utf-8") : Uint8Array.from(body);
    this.responses.set(url, { status, body: bytes });
  }

  deleteTestData(url: string): void {
    this.responses.delete(url);
  }

  /** Send `url` through the mock as a proxy: the absolute URL is the request target. */
  async request(url: string, options: MockRequestOptions = {}): Promise<MockRequestResult> {
    const target = new URL(url);
    return new Promise((resolve, reject) => {
      const req = httpRequest(
        {
          host: "127.0.0.1",
          port: this.port,
          method: options.method ?? "GET",
          path: target.href,
          headers: { ...options.headers, host: target.host },
        },
        (res) => {
          const chunks: Buffer[] = [];
          res.on("data", (chunk: Buffer) => chunks.push(chunk));
          res.on("error", reject);
          res.on("end", () => {
            resolve({
              status: res.statusCode ?? 0,
              headers: res.headers,
              body: Buffer.concat(chunks).toString("utf-8"),
            });
          });
        },
      );
      req.on("error", reject);
      req.end(options.body);
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
      this.server.closeAllConnections();
    });
  }
}
