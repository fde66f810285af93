import * as http from "http";
import { Logger } from "../logger";
import { Router } from "../router";

/**
 * The page is a static shell: the file list is filled in by
 * /static/upload.js from GET /files after load.
 */
const UPLOAD_PAGE_HTML = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>File Drop</title>
  <link rel="stylesheet" href="/static/style.css">
</head>
<body>
  <main class="container">
    <h1>File Drop</h1>

    <section class="upload-section">
      <h2>Upload a file</h2>
      <form id="uploadForm" enctype="multipart/form-data">
        <div class="file-input-container">
          <input type="file" id="fileInput" name="file" required>
          <label for="fileInput" class="file-input-label">Choose file</label>
          <span id="fileName" class="file-name"></span>
        </div>

        <div class="progress-container" id="progressContainer" hidden>
          <div class="progress-bar">
            <div class="progress-fill" id="progressFill"></div>
          </div>
          <span class="progress-text" id="progressText">0%</span>
        </div>

        <button type="submit" id="uploadBtn">Upload</button>
      </form>

      <div id="uploadStatus" class="upload-status" role="status"></div>
    </section>

    <section class="files-section">
      <h2>Uploaded files</h2>
      <div id="filesList" class="files-list">
        <p class="loading">Loading files…</p>
      </div>
    </section>
  </main>

  <script src="/static/upload.js"></script>
</body>
</html>`;

export class PageController {
  private logger: Logger;

  constructor(logger: Logger, router: Router) {
    this.logger = logger;
    this.registerRoutes(router);
  }

  private registerRoutes(router: Router): void {
    router.get("/", (req, res, _params) => {
      // #swagger.ignore = true
      return this.servePage(req, res);
    });
  }

  private servePage(
    _req: http.IncomingMessage,
    res: http.ServerResponse,
  ): void {
    this.logger.debug("Upload page requested");

    res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
    res.end(UPLOAD_PAGE_HTML);
  }
}
