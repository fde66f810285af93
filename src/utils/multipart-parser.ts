import * as http from "http";
import { Readable } from "stream";
import { finished } from "stream/promises";
import Busboy from "busboy";
import { BadRequestError } from "../errors/app-error";

/** Anything busboy can read a form from: a readable body plus its headers. */
export type MultipartRequest = Readable & { headers: http.IncomingHttpHeaders };

export interface FilePart {
  /** Filename exactly as the client sent it, directories included. */
  filename: string;
  mimeType: string;
  stream: Readable;
}

export type FilePartConsumer<T> = (part: FilePart) => Promise<T>;

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Settles once the client has sent the whole body or gone away. */
function bodyEnded(req: Readable): Promise<void> {
  if (req.readableEnded || req.destroyed) return Promise.resolve();
  return new Promise((resolve) => {
    const done = () => resolve();
    req.once("end", done);
    req.once("close", done);
    req.once("error", done);
  });
}

/**
 * Streams a multipart/form-data body through busboy and hands the first
 * file part named `fieldName` to `consume` while the body is still
 * arriving. Other file parts, and repeats of `fieldName`, are drained.
 *
 * Resolves with whatever `consume` resolves with. Rejects with
 * BadRequestError when the body is malformed or has no such file part,
 * and with the consumer's own error when the consumer fails first.
 */
export async function receiveMultipartFile<T>(
  req: MultipartRequest,
  fieldName: string,
  consume: FilePartConsumer<T>,
): Promise<T> {
  let busboy: Busboy.Busboy;
  try {
    // preservePath: hand the raw name on so the caller can reject traversal
    // instead of busboy silently stripping it.
    busboy = Busboy({ headers: req.headers, preservePath: true });
  } catch (err) {
    throw new BadRequestError(`Failed to parse multipart form: ${describe(err)}`);
  }

  let pending: Promise<T> | undefined;
  let consumerError: unknown;
  let consumerAbort: Error | undefined;

  // Detaches busboy and lets the rest of the body flow to nowhere, so the
  // connection stays usable for the error response.
  const drainRequest = (): void => {
    req.unpipe(busboy);
    req.resume();
  };

  // Failures surface through finished(busboy) below.
  busboy.on("error", () => undefined);
  req.once("error", (err) => busboy.destroy(err));

  busboy.on("file", (name, fileStream, info) => {
    // Destroying busboy destroys the open part too; that failure is
    // reported once, through busboy.
    fileStream.on("error", () => undefined);

    if (name !== fieldName || pending) {
      fileStream.resume();
      return;
    }

    pending = Promise.resolve()
      .then(() =>
        consume({
          // busboy reports filename="" as an absent name.
          filename: info.filename ?? "",
          mimeType: info.mimeType,
          stream: fileStream,
        }),
      )
      .catch((err: unknown) => {
        consumerError = err;
        if (!busboy.writableFinished && !busboy.destroyed) {
          consumerAbort = err instanceof Error ? err : new Error(describe(err));
          drainRequest();
          busboy.destroy(consumerAbort);
        }
        throw err;
      });

    // Awaited once the body has been read; this only marks it as observed.
    pending.catch(() => undefined);
  });

  req.pipe(busboy);

  try {
    await finished(busboy);
  } catch (err) {
    drainRequest();
    await bodyEnded(req);
    if (pending) {
      // Let the consumer finish its cleanup before answering.
      await pending.then(
        () => undefined,
        () => undefined,
      );
    }
    if (err === consumerAbort && consumerError !== undefined) {
      throw consumerError;
    }
    throw new BadRequestError(
      `Failed to parse multipart form: ${describe(err)}`,
    );
  }

  if (!pending) {
    throw new BadRequestError(`No file provided in the "${fieldName}" field`);
  }

  return pending;
}
