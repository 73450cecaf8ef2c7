/**
 * Health check route
 */

import { jsonResponse } from "#routes/utils.ts";

/**
 * Handle health check request
 */
export const handleHealthCheck = (method: string): Response | null =>
  method === "GET" ? jsonResponse({ status: "ok" }) : null;
