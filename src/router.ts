import * as http from "http";
import FindMyWay, { HTTPMethod } from "find-my-way";
import { Logger } from "./logger";
import {
  AppError,
  MethodNotAllowedError,
  NotFoundError,
} from "./errors/app-error";

export type RouteHandler = (
  req: http.IncomingMessage,
  res: http.ServerResponse,
  params: Record<string, string>,
) => void | Promise<void>;

/** Methods probed when a request matches no route, to tell 404 from 405. */
const KNOWN_METHODS: HTTPMethod[] = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "OPTIONS",
];

export class Router {
  private fmw: FindMyWay.Instance<FindMyWay.HTTPVersion.V1>;
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
    this.fmw = FindMyWay({
      defaultRoute: (req, res) => this.handleUnmatched(req, res),
    });
  }

  public get(path: string, handler: RouteHandler): void {
    this.addRoute("GET", path, handler);
  }

  public post(path: string, handler: RouteHandler): void {
    this.addRoute("POST", path, handler);
  }

  private addRoute(
    method: HTTPMethod,
    path: string,
    handler: RouteHandler,
  ): void {
    this.fmw.on(method, path, (req, res, params) => {
      const routeParams: Record<string, string> = {};
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) routeParams[key] = value;
      }

      this.logger.info(`${req.method} ${req.url}`);

      Promise.resolve()
        .then(() => handler(req, res, routeParams))
        .catch((err: unknown) => {
          this.handleRouteError(err, req, res, method, path);
        });
    });

    this.logger.debug(`Registered route: ${method} ${path}`);
  }

  public resolve(req: http.IncomingMessage, res: http.ServerResponse): void {
    this.fmw.lookup(req, res);
  }

  /**
   * Lists the methods registered for the request's path. find-my-way adds
   * HEAD for every GET route on its own.
   */
  public allowedMethods(url: string): string[] {
    return KNOWN_METHODS.filter(
      (method) => this.fmw.find(method, url) !== null,
    );
  }

  private handleUnmatched(
    req: http.IncomingMessage,
    res: http.ServerResponse,
  ): void {
    const method = req.method || "GET";
    const url = req.url || "/";
    const allowed = this.allowedMethods(url);
    const path = url.split("?")[0];

    const err =
      allowed.length > 0
        ? new MethodNotAllowedError(method, path, allowed)
        : new NotFoundError("Not Found");

    this.handleRouteError(err, req, res, method, path);
  }

  // ─── Centralised error handler ──────────────────────────────────────

  private handleRouteError(
    err: unknown,
    req: http.IncomingMessage,
    res: http.ServerResponse,
    method: string,
    path: string,
  ): void {
    if (res.writableEnded) return;

    // Body already streaming: the status line is gone, so cut the response.
    if (res.headersSent) {
      this.logger.error(`${method} ${req.url} failed mid-response`, {
        error: err instanceof Error ? err.message : String(err),
      });
      res.destroy();
      return;
    }

    if (err instanceof AppError) {
      const line = `${method} ${req.url} → ${err.statusCode} ${err.message}`;
      if (err.statusCode >= 500) {
        this.logger.error(line);
      } else {
        this.logger.warn(line);
      }

      const body: Record<string, unknown> = { error: err.message };
      if (err.details) body.details = err.details;

      const headers: http.OutgoingHttpHeaders = {
        "Content-Type": "application/json",
      };
      if (err instanceof MethodNotAllowedError) {
        headers.Allow = err.allowedMethods.join(", ");
      }

      res.writeHead(err.statusCode, headers);
      res.end(JSON.stringify(body));
      return;
    }

    // Unknown error: log the stack and answer 500
    this.logger.error(
      `Unhandled error in ${method} ${path}: ${
        err instanceof Error ? err.stack || err.message : String(err)
      }`,
    );
    res.writeHead(500, { "Content-Type": "application/json" });
    res.end(JSON.stringify({ error: "Internal Server Error" }));
  }
}
