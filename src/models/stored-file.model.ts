import { Readable } from "stream";

/** URL prefix under which stored files are downloadable. */
export const DOWNLOAD_PREFIX = "/download/";

/** A file as the store sees it on disk. */
export interface StoredFileInfo {
  name: string;
  size: number;
  modTime: Date;
}

/** Result of a completed upload. */
export interface SavedFile {
  name: string;
  size: number;
}

/** An opened file ready to be streamed back to a client. */
export interface OpenedFile extends StoredFileInfo {
  stream: Readable;
}

/** Wire shape of one entry returned by GET /files. */
export interface FileRecord {
  name: string;
  size: number;
  modTime: string;
  downloadUrl: string;
}

export function toFileRecord(file: StoredFileInfo): FileRecord {
  return {
    name: file.name,
    size: file.size,
    modTime: file.modTime.toISOString(),
    downloadUrl: DOWNLOAD_PREFIX + encodeURIComponent(file.name),
  };
}
