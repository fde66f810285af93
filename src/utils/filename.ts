import { BadRequestError } from "../errors/app-error";

/**
 * Reduces a client-supplied name to a bare filename that is safe to join
 * onto the store directory. Used for both uploads and downloads.
 *
 * Both separators count, since browsers on Windows may send a full
 * `C:\...` path. Any `..` segment is rejected outright rather than
 * stripped, so `../secret.txt` never quietly becomes `secret.txt`.
 */
export function sanitizeFilename(raw: string): string {
  if (raw.includes("\0")) {
    throw new BadRequestError("Invalid filename: contains a NUL byte");
  }

  const segments = raw.split(/[\\/]/).filter((segment) => segment !== "");

  if (segments.includes("..")) {
    throw new BadRequestError(
      `Invalid filename "${raw}": path traversal is not allowed`,
    );
  }

  const name = segments.pop();
  if (name === undefined || name === ".") {
    throw new BadRequestError(`Invalid filename "${raw}"`);
  }

  return name;
}

/**
 * Builds a `Content-Disposition: attachment` value. The quoted form keeps
 * printable ASCII only; `filename*` carries the exact name (RFC 6266).
 */
export function attachmentDisposition(filename: string): string {
  const fallback = filename
    .replace(/[^\x20-\x7e]/g, "_")
    .replace(/["\\]/g, "\\$&");
  const encoded = encodeURIComponent(filename).replace(
    /['()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}
