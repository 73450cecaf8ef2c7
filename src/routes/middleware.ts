/**
 * Middleware functions for request processing
 */

import { ErrorCode, logError } from "#lib/logger.ts";

/**
 * Security headers for all responses
 */
const BASE_SECURITY_HEADERS: Record<string, string> = {
  "x-content-type-options": "nosniff",
  "referrer-policy": "strict-origin-when-cross-origin",
};

/**
 * Get security headers for a response
 */
export const getSecurityHeaders = (): Record<string, string> => ({
  ...BASE_SECURITY_HEADERS,
});

/** Methods that carry a request body */
const BODY_METHODS = ["POST", "PUT"];

/** Body encodings the item routes can parse */
const ACCEPTED_CONTENT_TYPES = [
  "application/json",
  "application/x-www-form-urlencoded",
];

/**
 * Validate Content-Type for requests with a body
 * Returns true if the request is valid (no body expected, or an accepted Content-Type)
 */
export const isValidContentType = (request: Request): boolean => {
  if (!BODY_METHODS.includes(request.method)) return true;
  const contentType = request.headers.get("content-type") || "";
  return ACCEPTED_CONTENT_TYPES.some((type) => contentType.startsWith(type));
};

/**
 * Create Content-Type rejection response
 */
export const contentTypeRejectionResponse = (request: Request): Response => {
  logError({
    code: ErrorCode.VALIDATION_CONTENT_TYPE,
    detail: request.headers.get("content-type") ?? "missing",
  });
  return new Response("Bad Request: Invalid Content-Type", {
    status: 400,
    headers: {
      "content-type": "text/plain",
      ...getSecurityHeaders(),
    },
  });
};

/**
 * Apply security headers to a response
 */
export const applySecurityHeaders = (response: Response): Response => {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(getSecurityHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
};
