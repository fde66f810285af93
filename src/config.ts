import "reflect-metadata";
import {
  IsInt,
  IsNotEmpty,
  IsString,
  Max,
  Min,
  validateSync,
} from "class-validator";
import { plainToInstance } from "class-transformer";

export class AppConfig {
  @IsInt()
  @Min(0)
  @Max(65535)
  port: number = 8080;

  @IsString()
  @IsNotEmpty()
  host: string = "0.0.0.0";

  @IsString()
  nodeEnv: string = "development";

  @IsString()
  logLevel: string = "info";

  /** Directory holding uploaded files. Created on startup if missing. */
  @IsString()
  @IsNotEmpty()
  uploadDir: string = "./uploaded";

  /** Directory served verbatim under /static/. */
  @IsString()
  @IsNotEmpty()
  staticDir: string = "./static";

  /** Per-request timeout in milliseconds; 0 disables it. */
  @IsInt()
  @Min(0)
  requestTimeoutMs: number = 0;

  get isProduction(): boolean {
    return this.nodeEnv === "production";
  }
}

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  return Number(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = {
    port: numberFromEnv(env.PORT, 8080),
    host: env.HOST || "0.0.0.0",
    nodeEnv: env.NODE_ENV || "development",
    logLevel: env.LOG_LEVEL || "info",
    uploadDir: env.UPLOAD_DIR || "./uploaded",
    staticDir: env.STATIC_DIR || "./static",
    requestTimeoutMs: numberFromEnv(env.REQUEST_TIMEOUT_MS, 0),
  };

  const config = plainToInstance(AppConfig, raw);
  const errors = validateSync(config, { whitelist: true });

  if (errors.length > 0) {
    const messages = errors.map((e) =>
      Object.values(e.constraints || {}).join(", "),
    );
    throw new Error(`Invalid configuration:\n  ${messages.join("\n  ")}`);
  }

  return config;
}
