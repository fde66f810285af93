export interface FormPart {
  name: string;
  /** Present for file parts; omitted for plain text fields. */
  filename?: string;
  contentType?: string;
  content: string | Buffer;
}

export const TEST_BOUNDARY = "----file-drop-test-boundary";

export function multipartContentType(boundary = TEST_BOUNDARY): string {
  return `multipart/form-data; boundary=${boundary}`;
}

/** Encodes parts as a multipart/form-data body. */
export function buildMultipartBody(
  parts: FormPart[],
  boundary = TEST_BOUNDARY,
): Buffer {
  const chunks: Buffer[] = [];

  for (const part of parts) {
    let disposition = `form-data; name="${part.name}"`;
    if (part.filename !== undefined) {
      disposition += `; filename="${part.filename}"`;
    }

    let head = `--${boundary}\r\nContent-Disposition: ${disposition}\r\n`;
    if (part.filename !== undefined) {
      head += `Content-Type: ${part.contentType ?? "application/octet-stream"}\r\n`;
    }
    head += "\r\n";

    const content =
      typeof part.content === "string" ? Buffer.from(part.content) : part.content;
    chunks.push(Buffer.from(head), content, Buffer.from("\r\n"));
  }

  chunks.push(Buffer.from(`--${boundary}--\r\n`));
  return Buffer.concat(chunks);
}
