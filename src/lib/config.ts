/**
 * Configuration module for the item store
 * All settings come from environment variables
 */

import { getEnv, requireEnv } from "#lib/env.ts";

/** Port used when PORT is not set */
export const DEFAULT_PORT = 3000;

/**
 * Database URL (libsql): "file:data/items.db", ":memory:" or a remote URL
 */
export const getDbUrl = (): string => requireEnv("DB_URL");

/**
 * Auth token for remote databases
 * Returns undefined for local files
 */
export const getDbToken = (): string | undefined => getEnv("DB_TOKEN");

/**
 * HTTP port to listen on
 */
export const getPort = (): number => {
  const raw = getEnv("PORT");
  if (raw === undefined) return DEFAULT_PORT;
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`PORT must be a positive integer up to 65535, got "${raw}"`);
  }
  return port;
};
