/**
 * Node HTTP bridge - adapts node:http to fetch-style Request/Response handlers
 */

import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import { ErrorCode, logError } from "#lib/logger.ts";

/** Fetch-style request handler */
export type FetchHandler = (request: Request) => Promise<Response>;

/** Read the whole request body */
const readBody = async (message: IncomingMessage): Promise<Buffer> => {
  const chunks: Buffer[] = [];
  for await (const chunk of message) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
};

/** Copy incoming headers, joining repeated values */
const toHeaders = (message: IncomingMessage): Headers => {
  const headers = new Headers();
  for (const [key, value] of Object.entries(message.headers)) {
    if (value === undefined) continue;
    headers.set(key, Array.isArray(value) ? value.join(", ") : value);
  }
  return headers;
};

/**
 * Build a fetch Request from an incoming message
 */
export const toRequest = async (message: IncomingMessage): Promise<Request> => {
  const method = message.method ?? "GET";
  const host = message.headers.host ?? "localhost";
  const url = new URL(message.url ?? "/", `http://${host}`);
  const hasBody = method !== "GET" && method !== "HEAD";
  return new Request(url, {
    method,
    headers: toHeaders(message),
    body: hasBody ? new Uint8Array(await readBody(message)) : undefined,
  });
};

/**
 * Write a fetch Response to the outgoing message
 */
export const writeResponse = async (
  response: Response,
  res: ServerResponse,
): Promise<void> => {
  const body = Buffer.from(await response.arrayBuffer());
  res.writeHead(response.status, Object.fromEntries(response.headers.entries()));
  res.end(body);
};

/**
 * Start an HTTP server that answers every request through the handler
 */
export const startServer = (port: number, handler: FetchHandler): Promise<Server> =>
  new Promise((resolve, reject) => {
    const server = createServer((req, res) => {
      toRequest(req)
        .then(handler)
        .then((response) => writeResponse(response, res))
        .catch((error: unknown) => {
          logError({ code: ErrorCode.REQUEST_FAILED, detail: String(error) });
          if (!res.headersSent) res.writeHead(500, { "content-type": "text/plain" });
          res.end("Internal Server Error");
        });
    });
    server.once("error", reject);
    server.listen(port, () => resolve(server));
  });
