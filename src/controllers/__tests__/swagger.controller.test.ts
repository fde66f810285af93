import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DOCS_SPEC_PATH, SwaggerController } from "../swagger.controller";
import { Router } from "../../router";
import { HttpServer } from "../../http-server";
import { Logger } from "../../logger";
import { sendRequest } from "../../__tests__/helpers/http-client";

// ── Helpers ─────────────────────────────────────────────────────────────

const mockLogger: Logger = {
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
} as unknown as Logger;

const OPENAPI_DOC = {
  openapi: "3.0.0",
  info: { title: "File Drop", version: "1.0.0" },
  paths: { "/files": { get: { summary: "List uploaded files" } } },
};

async function startDocsServer(specPath: string): Promise<{ server: HttpServer; port: number }> {
  const router = new Router(mockLogger);
  new SwaggerController(mockLogger, router, specPath);
  const server = new HttpServer(router, mockLogger, {
    port: 0,
    host: "127.0.0.1",
    requestTimeoutMs: 0,
  });
  const port = await server.start();
  return { server, port };
}

// ── Tests ───────────────────────────────────────────────────────────────

describe("SwaggerController", () => {
  let workDir: string;
  let server: HttpServer | undefined;

  beforeEach(async () => {
    jest.clearAllMocks();
    workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "api-docs-"));
  });

  afterEach(async () => {
    await server?.stop();
    server = undefined;
    await fs.promises.rm(workDir, { recursive: true, force: true });
  });

  describe("with a generated document", () => {
    let port: number;

    beforeEach(async () => {
      const specPath = path.join(workDir, "swagger-output.json");
      await fs.promises.writeFile(specPath, JSON.stringify(OPENAPI_DOC, null, 2));
      ({ server, port } = await startDocsServer(specPath));
    });

    it("should serve the document as JSON", async () => {
      const res = await sendRequest(port, { path: "/api-docs/swagger.json" });

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toBe("application/json");
      expect(JSON.parse(res.text)).toEqual(OPENAPI_DOC);
    });

    it("should serve a Swagger UI page pointing at the document", async () => {
      const res = await sendRequest(port, { path: "/api-docs" });

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toBe("text/html; charset=utf-8");
      expect(res.text).toContain("<title>File Drop - API Docs</title>");
      expect(res.text).toContain(`url: '${DOCS_SPEC_PATH}'`);
    });

    it("should not warn", () => {
      expect(mockLogger.warn).not.toHaveBeenCalled();
    });
  });

  describe("without a generated document", () => {
    let port: number;

    beforeEach(async () => {
      ({ server, port } = await startDocsServer(path.join(workDir, "missing.json")));
    });

    it("should serve an empty document", async () => {
      const res = await sendRequest(port, { path: "/api-docs/swagger.json" });

      expect(res.status).toBe(200);
      expect(res.text).toBe("{}");
    });

    it("should warn once at startup", () => {
      expect(mockLogger.warn).toHaveBeenCalledTimes(1);
    });
  });

  it("should fail at startup on a corrupt document", async () => {
    const specPath = path.join(workDir, "broken.json");
    await fs.promises.writeFile(specPath, "{ not json");

    expect(
      () => new SwaggerController(mockLogger, new Router(mockLogger), specPath),
    ).toThrow(SyntaxError);
  });
});
