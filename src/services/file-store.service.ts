import * as fs from "fs";
import * as path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { v4 as uuidv4 } from "uuid";
import { Logger } from "../logger";
import { AppConfig } from "../config";
import {
  AppError,
  BadRequestError,
  InternalError,
  NotFoundError,
} from "../errors/app-error";
import {
  OpenedFile,
  SavedFile,
  StoredFileInfo,
} from "../models/stored-file.model";

/**
 * Subdirectory of the store that holds uploads still in flight. Living on
 * the same filesystem as the store keeps the final rename atomic, and
 * being a directory keeps it out of listings.
 */
export const STAGING_DIR_NAME = ".uploading";

/**
 * Flat directory of uploaded files. Callers pass names that already went
 * through sanitizeFilename; the store only joins them onto its root.
 */
export class FileStore {
  private logger: Logger;
  private root: string;
  private stagingDir: string;

  constructor(logger: Logger, config: AppConfig) {
    this.logger = logger;
    this.root = path.resolve(config.uploadDir);
    this.stagingDir = path.join(this.root, STAGING_DIR_NAME);
  }

  public getRoot(): string {
    return this.root;
  }

  /** Creates the store and its staging area if they do not exist yet. */
  public async init(): Promise<void> {
    await fs.promises.mkdir(this.stagingDir, { recursive: true });
    this.logger.info(`File store ready at ${this.root}`);
  }

  // ─── SAVE ────────────────────────────────────────────────────────────

  /**
   * Streams `source` into a staging file, then renames it over `name`.
   * A reader of `name` sees either the previous file or the complete new
   * one. On failure the staging file is removed and nothing under `name`
   * changes.
   */
  public async save(name: string, source: Readable): Promise<SavedFile> {
    if (name === STAGING_DIR_NAME) {
      source.resume();
      throw new BadRequestError(`"${name}" is a reserved name`);
    }

    const stagingPath = path.join(this.stagingDir, `${uuidv4()}.part`);
    const destination = path.join(this.root, name);

    const out = fs.createWriteStream(stagingPath, { flags: "wx" });
    try {
      await pipeline(source, out);
      await fs.promises.rename(stagingPath, destination);
    } catch (err) {
      // The stream may still be opening its file; removing it before then
      // would leave the file behind.
      out.destroy();
      await this.closed(out);
      await this.discard(stagingPath);
      throw this.mapFsError(err, "save", name);
    }

    this.logger.info(`Stored ${name}`, { name, size: out.bytesWritten });

    return { name, size: out.bytesWritten };
  }

  // ─── LIST ────────────────────────────────────────────────────────────

  /** Plain files directly under the root, in directory order. */
  public async list(): Promise<StoredFileInfo[]> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(this.root, { withFileTypes: true });
    } catch (err) {
      throw this.mapFsError(err, "list", this.root);
    }

    const files: StoredFileInfo[] = [];
    for (const entry of entries) {
      if (entry.isDirectory()) continue;

      let stats: fs.Stats;
      try {
        stats = await fs.promises.stat(path.join(this.root, entry.name));
      } catch (err) {
        // Removed between readdir and stat, or a dangling symlink.
        this.logger.warn(`Skipping ${entry.name}: stat failed`, {
          name: entry.name,
          code: this.errorCode(err),
        });
        continue;
      }

      if (stats.isDirectory()) continue;

      files.push({
        name: entry.name,
        size: stats.size,
        modTime: stats.mtime,
      });
    }

    return files;
  }

  // ─── OPEN ────────────────────────────────────────────────────────────

  /**
   * Opens `name` for reading. Size and mtime come from the open handle, so
   * they describe exactly the bytes the stream will yield.
   */
  public async open(name: string): Promise<OpenedFile> {
    const filePath = path.join(this.root, name);

    let handle: fs.promises.FileHandle;
    try {
      handle = await fs.promises.open(filePath, "r");
    } catch (err) {
      throw this.mapFsError(err, "open", name);
    }

    let stats: fs.Stats;
    try {
      stats = await handle.stat();
    } catch (err) {
      await handle.close();
      throw this.mapFsError(err, "open", name);
    }

    if (!stats.isFile()) {
      await handle.close();
      throw new NotFoundError(`File "${name}" not found`);
    }

    return {
      name,
      size: stats.size,
      modTime: stats.mtime,
      stream: handle.createReadStream(),
    };
  }

  // ─── HELPERS ─────────────────────────────────────────────────────────

  private closed(stream: fs.WriteStream): Promise<void> {
    if (stream.closed) return Promise.resolve();
    return new Promise((resolve) => stream.once("close", () => resolve()));
  }

  /** Best-effort removal of a staging file; failures are only logged. */
  private async discard(stagingPath: string): Promise<void> {
    try {
      await fs.promises.rm(stagingPath, { force: true });
    } catch (err) {
      this.logger.warn(`Could not remove partial upload ${stagingPath}`, {
        code: this.errorCode(err),
      });
    }
  }

  private errorCode(err: unknown): string | undefined {
    if (err && typeof err === "object" && "code" in err) {
      const { code } = err;
      return typeof code === "string" ? code : undefined;
    }
    return undefined;
  }

  /**
   * Translates Node filesystem errors into typed AppErrors so the router's
   * catch-all can answer with the right status code.
   */
  private mapFsError(err: unknown, operation: string, name: string): AppError {
    if (err instanceof AppError) return err;

    const code = this.errorCode(err) || "";
    const message = err instanceof Error ? err.message : String(err);

    if (code === "ENOENT" && operation === "open") {
      return new NotFoundError(`File "${name}" not found`);
    }

    this.logger.error(`File ${operation} failed for "${name}": ${code}`, {
      code,
      message,
    });

    switch (code) {
      case "EACCES":
      case "EPERM":
        return new InternalError(
          `Permission denied while trying to ${operation} "${name}"`,
        );

      case "ENOSPC":
      case "EDQUOT":
        return new InternalError(
          `No space left on the upload volume while trying to ${operation} "${name}"`,
        );

      case "EISDIR":
      case "ENOTEMPTY":
        return new InternalError(`"${name}" is occupied by a directory`);

      default:
        return new InternalError(
          `File ${operation} failed: ${message || code}`,
        );
    }
  }
}
