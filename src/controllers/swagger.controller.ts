import * as http from "http";
import * as fs from "fs";
import * as path from "path";
import { Logger } from "../logger";
import { Router } from "../router";

/** Written by `npm run swagger`. */
export const SWAGGER_SPEC_PATH = path.join(
  __dirname,
  "../swagger/swagger-output.json",
);

export const DOCS_PATH = "/api-docs";
export const DOCS_SPEC_PATH = `${DOCS_PATH}/swagger.json`;

function renderDocsPage(specUrl: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>File Drop - API Docs</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@5/swagger-ui.css" />
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="https://unpkg.com/swagger-ui-dist@5/swagger-ui-bundle.js"></script>
  <script>
    SwaggerUIBundle({ url: '${specUrl}', dom_id: '#swagger-ui' });
  </script>
</body>
</html>`;
}

/**
 * Serves the generated OpenAPI document and a Swagger UI page for it.
 * The document is read once at startup; without it the routes still
 * answer, with an empty document.
 */
export class SwaggerController {
  private logger: Logger;
  private specJson: string;

  constructor(logger: Logger, router: Router, specPath = SWAGGER_SPEC_PATH) {
    this.logger = logger;
    this.specJson = this.readSpec(specPath);
    router.get(DOCS_PATH, (_req, res, _params) => this.sendPage(res));
    router.get(DOCS_SPEC_PATH, (_req, res, _params) => this.sendSpec(res));
  }

  private readSpec(specPath: string): string {
    if (!fs.existsSync(specPath)) {
      this.logger.warn(
        `No OpenAPI document at ${specPath}; run "npm run swagger" to generate it.`,
      );
      return "{}";
    }
    // Parsed once so a corrupt file fails at startup, not per request.
    return JSON.stringify(JSON.parse(fs.readFileSync(specPath, "utf-8")));
  }

  private sendSpec(res: http.ServerResponse): void {
    res.writeHead(200, {
      "Content-Type": "application/json",
      "Content-Length": Buffer.byteLength(this.specJson).toString(),
    });
    res.end(this.specJson);
  }

  private sendPage(res: http.ServerResponse): void {
    const html = renderDocsPage(DOCS_SPEC_PATH);
    res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
    res.end(html);
  }
}
