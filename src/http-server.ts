/**
 * node:http adapter for the route table in routes.ts: reads the body (up to
 * MAX_BODY_BYTES), dispatches, writes JSON or WAV, logs arrival and
 * completion.
 */

import { createServer, type IncomingMessage, type Server } from "http";
import type { Readable } from "stream";
import { errorMessage } from "./errors";
import { handleRequest, type RouteRequest, type RouteResponse, type RouterDeps } from "./routes";

/** 25 MiB, several minutes of 16 kHz speech. */
export const MAX_BODY_BYTES = 25 * 1024 * 1024;

export class BodyTooLargeError extends Error {}

/** The parts of an incoming request the adapter reads. */
export type IncomingRequest = Readable & Pick<IncomingMessage, "method" | "url" | "headers">;

/** The parts of a ServerResponse the adapter writes. */
export interface ResponseSink {
  writeHead(status: number, headers: Record<string, string>): unknown;
  end(body: string | Buffer): unknown;
}

export type Dispatch = (request: RouteRequest) => Promise<RouteResponse>;

export function readBody(req: Readable, limit: number): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let failed = false;
    req.on("data", (chunk: Buffer) => {
      if (failed) return;
      size += chunk.byteLength;
      if (size > limit) {
        failed = true;
        reject(new BodyTooLargeError(`Body exceeds ${limit} bytes`));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (!failed) resolve(new Uint8Array(Buffer.concat(chunks)));
    });
    req.on("error", (err) => {
      if (!failed) reject(err);
    });
  });
}

function headerMap(req: IncomingRequest): Record<string, string | undefined> {
  const headers: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(req.headers)) {
    headers[key.toLowerCase()] = Array.isArray(value) ? value.join(", ") : value;
  }
  return headers;
}

export function send(res: ResponseSink, response: RouteResponse): void {
  const headers: Record<string, string> = { ...(response.headers ?? {}) };
  if ("audio" in response) {
    headers["Content-Type"] = "audio/wav";
    headers["Content-Length"] = String(response.audio.byteLength);
    res.writeHead(response.status, headers);
    res.end(Buffer.from(response.audio));
    return;
  }
  const body = JSON.stringify(response.json);
  headers["Content-Type"] = "application/json";
  headers["Content-Length"] = String(Buffer.byteLength(body));
  res.writeHead(response.status, headers);
  res.end(body);
}

/** Read, dispatch and answer one request. */
export async function serve(
  req: IncomingRequest,
  res: ResponseSink,
  dispatch: Dispatch,
  limit: number = MAX_BODY_BYTES,
): Promise<void> {
  const method = req.method ?? "GET";
  const path = (req.url ?? "/").split("?")[0];
  const start = Date.now();
  console.error(`[http] → ${method} ${path}`);

  let response: RouteResponse;
  try {
    const body = await readBody(req, limit);
    const request: RouteRequest = { method, path, headers: headerMap(req), body };
    response = await dispatch(request);
  } catch (err) {
    response =
      err instanceof BodyTooLargeError
        ? { status: 413, json: { error: err.message } }
        : { status: 400, json: { error: `Could not read request: ${errorMessage(err)}` } };
  }

  send(res, response);
  const seconds = ((Date.now() - start) / 1000).toFixed(2);
  console.error(`[http] ← ${method} ${path} → ${response.status} (${seconds}s)`);
}

export function createHttpServer(deps: RouterDeps): Server {
  return createServer((req, res) => {
    serve(req, res, (request) => handleRequest(request, deps)).catch((err: unknown) => {
      console.error(`[http] → ERROR: ${errorMessage(err)}`);
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "application/json" });
      }
      res.end(JSON.stringify({ error: "Internal server error" }));
    });
  });
}

/** Listen and resolve with the bound port. */
export function listen(server: Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      const address = server.address();
      resolve(typeof address === "object" && address !== null ? address.port : port);
    });
  });
}

export function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}
