/**
 * Routes module - main exports and request pipeline
 */

import { createRequestTimer, ErrorCode, logError, logRequest, runWithRequestId } from "#lib/logger.ts";
import { handleHealthCheck } from "#routes/health.ts";
import { routeItems } from "#routes/items.ts";
import {
  applySecurityHeaders,
  contentTypeRejectionResponse,
  isValidContentType,
} from "#routes/middleware.ts";
import type { RouterFn } from "#routes/router.ts";
import { notFoundResponse, parseRequest, temporaryErrorResponse } from "#routes/utils.ts";

// Re-export middleware functions for testing
export { getSecurityHeaders, isValidContentType } from "#routes/middleware.ts";

/** Route health check requests */
const routeHealth: RouterFn = (_, path, method) =>
  Promise.resolve(path === "/health" ? handleHealthCheck(method) : null);

/**
 * Route application requests, falling back to 404
 */
const handleRequestInternal = async (
  request: Request,
  path: string,
  method: string,
): Promise<Response> =>
  (await routeHealth(request, path, method)) ??
  (await routeItems(request, path, method)) ??
  notFoundResponse();

/** Log request and return response */
const logAndReturn = (
  response: Response,
  method: string,
  path: string,
  getElapsed: () => number,
): Response => {
  logRequest({ method, path, status: response.status, durationMs: getElapsed() });
  return response;
};

/**
 * Handle incoming requests with security headers and Content-Type validation
 */
export const handleRequest = (request: Request): Promise<Response> =>
  runWithRequestId(async () => {
    const { path, method } = parseRequest(request);
    const getElapsed = createRequestTimer();

    // Reject bodies the item routes cannot parse
    if (!isValidContentType(request)) {
      return logAndReturn(contentTypeRejectionResponse(request), method, path, getElapsed);
    }

    try {
      const response = await handleRequestInternal(request, path, method);
      return logAndReturn(applySecurityHeaders(response), method, path, getElapsed);
    } catch (error) {
      logError({ code: ErrorCode.REQUEST_FAILED, detail: String(error) });
      return logAndReturn(
        applySecurityHeaders(temporaryErrorResponse()),
        method,
        path,
        getElapsed,
      );
    }
  });
