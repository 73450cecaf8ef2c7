/**
 * Shared utilities for route handlers
 */

import { ErrorCode, logError } from "#lib/logger.ts";

/** Create JSON response */
export const jsonResponse = (data: unknown, status = 200): Response =>
  new Response(JSON.stringify(data), {
    status,
    headers: { "content-type": "application/json; charset=utf-8" },
  });

/** JSON error body */
export const errorResponse = (
  message: string,
  status: number,
  extra: Record<string, unknown> = {},
): Response => jsonResponse({ status: "error", message, ...extra }, status);

/**
 * Create 404 not found response
 */
export const notFoundResponse = (): Response => errorResponse("Not found", 404);

/**
 * Create 503 response for storage outages and unexpected failures
 */
export const temporaryErrorResponse = (): Response =>
  new Response("Temporary error", {
    status: 503,
    headers: { "content-type": "text/plain", "retry-after": "5" },
  });

/**
 * Normalize path by stripping trailing slashes (except root "/")
 * This allows consistent path comparisons like "/items" instead of checking both "/items" and "/items/"
 */
export const normalizePath = (path: string): string =>
  path !== "/" && path.endsWith("/") ? path.replace(/\/+$/, "") || "/" : path;

/**
 * Parse request URL and extract path/method
 * Paths are normalized to strip trailing slashes
 */
export const parseRequest = (
  request: Request,
): { url: URL; path: string; method: string } => {
  const url = new URL(request.url);
  return { url, path: normalizePath(url.pathname), method: request.method };
};

/** Check for a plain (non-array) JSON object */
const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Parsed request body, or a ready-made 400 response */
export type BodyResult =
  | { ok: true; body: URLSearchParams | Record<string, unknown> }
  | { ok: false; response: Response };

/**
 * Parse a JSON object or form-urlencoded request body.
 * Content-Type is already validated by middleware.
 */
export const parseBody = async (request: Request): Promise<BodyResult> => {
  const contentType = request.headers.get("content-type") ?? "";
  if (!contentType.startsWith("application/json")) {
    return { ok: true, body: new URLSearchParams(await request.text()) };
  }

  try {
    const body: unknown = await request.json();
    if (isRecord(body)) return { ok: true, body };
    logError({ code: ErrorCode.VALIDATION_FORM, detail: "JSON body is not an object" });
  } catch (error) {
    logError({ code: ErrorCode.VALIDATION_FORM, detail: `Malformed JSON body: ${String(error)}` });
  }
  return { ok: false, response: errorResponse("Invalid request body", 400) };
};
