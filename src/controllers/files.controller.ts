import * as http from "http";
import { pipeline } from "stream/promises";
import { Logger } from "../logger";
import { Router } from "../router";
import { FileStore } from "../services/file-store.service";
import { toFileRecord } from "../models/stored-file.model";
import { receiveMultipartFile } from "../utils/multipart-parser";
import { attachmentDisposition, sanitizeFilename } from "../utils/filename";
import { BadRequestError } from "../errors/app-error";

/** Form field the upload page posts the file under. */
export const UPLOAD_FIELD = "file";

export class FilesController {
  private logger: Logger;
  private fileStore: FileStore;

  constructor(logger: Logger, router: Router, fileStore: FileStore) {
    this.logger = logger;
    this.fileStore = fileStore;
    this.registerRoutes(router);
  }

  private registerRoutes(router: Router): void {
    router.post("/upload", (req, res, _params) => {
      // #swagger.tags = ['Files']
      // #swagger.summary = 'Upload a file'
      // #swagger.description = 'Streams a single file to the upload directory. Send as multipart/form-data with a "file" field. An existing file with the same name is replaced.'
      /* #swagger.requestBody = {
        required: true,
        content: {
          'multipart/form-data': {
            schema: {
              type: 'object',
              required: ['file'],
              properties: {
                file: { type: 'string', format: 'binary', description: 'Any file' }
              }
            }
          }
        }
      } */
      /* #swagger.responses[200] = {
        description: 'File stored',
        content: {
          'application/json': {
            schema: {
              type: 'object',
              properties: {
                success: { type: 'boolean', example: true },
                filename: { type: 'string', example: 'report.txt' },
                size: { type: 'number', example: 1024 },
                message: { type: 'string', example: 'File uploaded successfully' }
              }
            }
          }
        }
      } */
      /* #swagger.responses[400] = {
        description: 'Malformed form, missing file part or invalid filename'
      } */
      return this.uploadFile(req, res);
    });
    router.get("/files", (req, res, _params) => {
      // #swagger.tags = ['Files']
      // #swagger.summary = 'List uploaded files'
      // #swagger.description = 'Returns every file in the upload directory, in directory order.'
      /* #swagger.responses[200] = {
        description: 'Uploaded files',
        content: {
          'application/json': {
            schema: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  name: { type: 'string', example: 'report.txt' },
                  size: { type: 'number', example: 1024 },
                  modTime: { type: 'string', format: 'date-time' },
                  downloadUrl: { type: 'string', example: '/download/report.txt' }
                }
              }
            }
          }
        }
      } */
      return this.listFiles(req, res);
    });
    router.get("/download/*", (req, res, params) => {
      // #swagger.tags = ['Files']
      // #swagger.summary = 'Download a file'
      // #swagger.description = 'Streams the file back as an attachment, always as application/octet-stream.'
      /* #swagger.responses[200] = { description: 'The raw file content' } */
      /* #swagger.responses[400] = { description: 'Invalid filename' } */
      /* #swagger.responses[404] = { description: 'File not found' } */
      return this.downloadFile(req, res, params);
    });
  }

  // ─── UPLOAD ──────────────────────────────────────────────────────────

  private async uploadFile(
    req: http.IncomingMessage,
    res: http.ServerResponse,
  ): Promise<void> {
    const contentType = req.headers["content-type"] || "";

    if (!contentType.includes("multipart/form-data")) {
      throw new BadRequestError("Content-Type must be multipart/form-data");
    }

    const saved = await receiveMultipartFile(req, UPLOAD_FIELD, (part) =>
      this.fileStore.save(sanitizeFilename(part.filename), part.stream),
    );

    this.logger.info("File uploaded successfully", {
      filename: saved.name,
      size: saved.size,
    });

    res.writeHead(200, { "Content-Type": "application/json" });
    res.end(
      JSON.stringify({
        success: true,
        filename: saved.name,
        size: saved.size,
        message: "File uploaded successfully",
      }),
    );
  }

  // ─── LIST ────────────────────────────────────────────────────────────

  private async listFiles(
    _req: http.IncomingMessage,
    res: http.ServerResponse,
  ): Promise<void> {
    const files = await this.fileStore.list();

    res.writeHead(200, { "Content-Type": "application/json" });
    res.end(JSON.stringify(files.map(toFileRecord)));
  }

  // ─── DOWNLOAD ────────────────────────────────────────────────────────

  private async downloadFile(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    params: Record<string, string>,
  ): Promise<void> {
    const filename = sanitizeFilename(params["*"] ?? "");
    const file = await this.fileStore.open(filename);

    res.writeHead(200, {
      "Content-Type": "application/octet-stream",
      "Content-Disposition": attachmentDisposition(filename),
      "Content-Length": file.size.toString(),
      "Last-Modified": file.modTime.toUTCString(),
    });

    if (req.method === "HEAD") {
      file.stream.destroy();
      res.end();
      return;
    }

    this.logger.info("Serving download", { filename, size: file.size });
    await pipeline(file.stream, res);
  }
}
