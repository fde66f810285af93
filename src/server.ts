import "reflect-metadata";
import "dotenv/config";
import { loadConfig } from "./config";
import { Logger } from "./logger";
import { createApp } from "./app";

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger(config);

  const server = await createApp(config, logger);
  await server.start();

  logger.info("Directories", {
    uploadDir: config.uploadDir,
    staticDir: config.staticDir,
  });

  // ── Graceful shutdown ───────────────────────────────────────────────
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    try {
      await server.stop();
    } catch (err) {
      logger.error(`Shutdown error: ${err}`);
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  // ── Last-resort error handlers ──────────────────────────────────────
  process.on("uncaughtException", (err) => {
    logger.error(`Uncaught exception: ${err.stack || err.message}`);
    process.exit(1);
  });

  process.on("unhandledRejection", (reason) => {
    logger.error(`Unhandled rejection: ${reason}`);
  });
}

bootstrap().catch((err: unknown) => {
  console.error(
    `Failed to start: ${err instanceof Error ? err.stack || err.message : err}`,
  );
  process.exit(1);
});
