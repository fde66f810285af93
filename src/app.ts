import { AppConfig } from "./config";
import { Logger } from "./logger";
import { Router } from "./router";
import { HttpServer } from "./http-server";
import { HealthController } from "./controllers/health.controller";
import { SwaggerController } from "./controllers/swagger.controller";
import { PageController } from "./controllers/page.controller";
import { StaticController } from "./controllers/static.controller";
import { FilesController } from "./controllers/files.controller";
import { FileStore } from "./services/file-store.service";

/**
 * Composition root: wires every dependency by hand.
 * No DI container is used; every dependency is explicit.
 */
export async function createApp(
  config: AppConfig,
  logger: Logger,
): Promise<HttpServer> {
  // -- Shared services --
  const router = new Router(logger);
  const fileStore = new FileStore(logger, config);
  await fileStore.init();

  // -- Controllers (self-register routes via constructor) --
  new HealthController(logger, router);
  new PageController(logger, router);
  new StaticController(logger, router, config);
  new FilesController(logger, router, fileStore);
  new SwaggerController(logger, router);

  return new HttpServer(router, logger, {
    port: config.port,
    host: config.host,
    requestTimeoutMs: config.requestTimeoutMs,
  });
}
