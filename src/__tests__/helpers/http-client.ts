import * as http from "http";

export interface TestResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: Buffer;
  text: string;
}

export interface TestRequest {
  method?: string;
  path: string;
  headers?: http.OutgoingHttpHeaders;
  body?: Buffer | string;
}

/**
 * Sends one request to the in-process server. The path goes out exactly
 * as given, so `/download/../x` reaches the router un-normalised.
 */
export function sendRequest(
  port: number,
  { method = "GET", path, headers = {}, body }: TestRequest,
): Promise<TestResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        host: "127.0.0.1",
        port,
        method,
        path,
        headers: {
          ...headers,
          ...(body !== undefined && {
            "Content-Length": Buffer.byteLength(body).toString(),
          }),
        },
        agent: false,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("error", reject);
        res.on("end", () => {
          const data = Buffer.concat(chunks);
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: data,
            text: data.toString("utf-8"),
          });
        });
      },
    );
    req.on("error", reject);
    req.end(body);
  });
}
