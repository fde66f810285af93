import * as http from "http";
import * as path from "path";
import serveStatic from "serve-static";
import { Logger } from "../logger";
import { Router } from "../router";
import { AppConfig } from "../config";
import { NotFoundError } from "../errors/app-error";

const STATIC_PREFIX = "/static";

/** Serves the front-end assets under /static/ byte for byte. */
export class StaticController {
  private logger: Logger;
  private serve: serveStatic.RequestHandler<http.ServerResponse>;

  constructor(logger: Logger, router: Router, config: AppConfig) {
    this.logger = logger;
    // No directory listings or index files; misses fall through to a 404.
    this.serve = serveStatic(path.resolve(config.staticDir), {
      index: false,
      redirect: false,
      fallthrough: true,
    });
    this.registerRoutes(router);
  }

  private registerRoutes(router: Router): void {
    router.get(`${STATIC_PREFIX}/*`, (req, res, _params) => {
      // #swagger.ignore = true
      return this.serveAsset(req, res);
    });
  }

  /**
   * Hands the request to serve-static with the prefix stripped from its
   * URL. Resolves when the response closes; rejects when the asset does
   * not exist or cannot be read.
   */
  private serveAsset(
    req: http.IncomingMessage,
    res: http.ServerResponse,
  ): Promise<void> {
    const originalUrl = req.url ?? STATIC_PREFIX;
    req.url = originalUrl.slice(STATIC_PREFIX.length) || "/";

    return new Promise<void>((resolve, reject) => {
      res.once("close", () => {
        req.url = originalUrl;
        resolve();
      });

      this.serve(req, res, (err?: unknown) => {
        req.url = originalUrl;
        if (err) {
          reject(err);
          return;
        }
        const asset = originalUrl.split("?")[0];
        this.logger.debug(`No static asset at ${asset}`);
        reject(new NotFoundError(`Asset "${asset}" not found`));
      });
    });
  }
}
