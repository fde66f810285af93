import * as http from "http";
import { Router } from "./router";
import { Logger } from "./logger";

export interface HttpServerOptions {
  port: number;
  host: string;
  /** 0 leaves requests without a timeout. */
  requestTimeoutMs: number;
}

export class HttpServer {
  private server: http.Server;
  private logger: Logger;
  private options: HttpServerOptions;

  constructor(router: Router, logger: Logger, options: HttpServerOptions) {
    this.logger = logger;
    this.options = options;

    const { requestTimeoutMs } = options;

    this.server = http.createServer((req, res) => {
      if (requestTimeoutMs > 0) {
        res.setTimeout(requestTimeoutMs, () => {
          this.logger.warn(
            `Request timed out after ${requestTimeoutMs}ms: ${req.method} ${req.url}`,
          );
          if (!res.headersSent) {
            res.writeHead(408, { "Content-Type": "application/json" });
            res.end(JSON.stringify({ error: "Request Timeout" }));
          } else {
            res.destroy();
          }
        });
      }

      router.resolve(req, res);
    });
  }

  /** Starts listening and resolves with the bound port (useful with port 0). */
  public start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.server.once("error", onError);
      this.server.listen(this.options.port, this.options.host, () => {
        this.server.off("error", onError);
        const port = this.port();
        this.logger.info(
          `File Drop server running on http://${this.options.host}:${port}`,
        );
        resolve(port);
      });
    });
  }

  public port(): number {
    const address = this.server.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    return this.options.port;
  }

  /** Stops accepting new connections and waits for in-flight requests. */
  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) {
          this.logger.error(`Error stopping server: ${err.message}`);
          return reject(err);
        }
        this.logger.info("Server stopped gracefully");
        resolve();
      });
      this.server.closeIdleConnections();
    });
  }
}
