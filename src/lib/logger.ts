/**
 * Privacy-safe logging utilities
 *
 * - Request logging: logs method, path (ids redacted), status, duration
 * - Error logging: logs classified error codes without record contents
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";

/**
 * Error codes for classified error logging
 * Format: E_CATEGORY_DETAIL
 */
export const ErrorCode = {
  // Database errors
  DB_QUERY: "E_DB_QUERY",

  // Validation errors
  VALIDATION_FORM: "E_VALIDATION_FORM",
  VALIDATION_CONTENT_TYPE: "E_VALIDATION_CONTENT_TYPE",

  // Request/server lifecycle
  REQUEST_FAILED: "E_REQUEST_FAILED",
  SERVER_START: "E_SERVER_START",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

const requestIdStorage = new AsyncLocalStorage<string>();

/**
 * Run a function with a fresh request id attached to every log line it emits
 */
export const runWithRequestId = <T>(fn: () => T): T =>
  requestIdStorage.run(randomUUID().slice(0, 8), fn);

/** Current request id, if running inside runWithRequestId */
export const getRequestId = (): string | undefined =>
  requestIdStorage.getStore();

/** Prefix a log line with the active request id */
const withRequestId = (line: string): string => {
  const id = getRequestId();
  return id ? `[${id}] ${line}` : line;
};

/**
 * Redact dynamic segments from paths for privacy-safe logging
 * Replaces numeric ids: /items/123 -> /items/[id]
 */
export const redactPath = (path: string): string =>
  path.replace(/\/\d+(?=\/|$)/g, "/[id]");

/**
 * Request log entry (privacy-safe)
 */
type RequestLogEntry = {
  method: string;
  path: string;
  status: number;
  durationMs: number;
};

/**
 * Log a completed request to console.debug
 * Path is automatically redacted
 */
export const logRequest = (entry: RequestLogEntry): void => {
  const { method, path, status, durationMs } = entry;
  console.debug(
    withRequestId(`[Request] ${method} ${redactPath(path)} ${status} ${durationMs}ms`),
  );
};

/**
 * Error log context (safe metadata only)
 */
type ErrorContext = {
  /** Error code for classification */
  code: ErrorCodeType;
  /** Optional: record id */
  itemId?: number;
  /** Optional: additional safe context */
  detail?: string;
};

/**
 * Log a classified error to console.error
 * Only logs error codes and safe metadata, never field values
 */
export const logError = (context: ErrorContext): void => {
  const { code, itemId, detail } = context;

  const parts = [
    `[Error] ${code}`,
    itemId !== undefined ? `item=${itemId}` : null,
    detail ? `detail="${detail}"` : null,
  ].filter(Boolean);

  console.error(withRequestId(parts.join(" ")));
};

/**
 * Create a request timer for measuring duration
 */
export const createRequestTimer = (): (() => number) => {
  const start = performance.now();
  return () => Math.round(performance.now() - start);
};

/**
 * Log categories for debug logging
 */
export type LogCategory = "Server" | "Db";

/**
 * Log a debug message with category prefix
 */
export const logDebug = (category: LogCategory, message: string): void => {
  console.debug(withRequestId(`[${category}] ${message}`));
};
