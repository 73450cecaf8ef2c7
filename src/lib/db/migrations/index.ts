/**
 * Database schema bootstrap
 */

import { getDb } from "#lib/db/client.ts";
import { logDebug } from "#lib/logger.ts";

/**
 * Statements creating every table the service uses.
 * AUTOINCREMENT keeps ids of deleted rows from being handed out again.
 */
const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS items (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL CHECK (length(name) > 0),
    description TEXT NOT NULL CHECK (length(description) > 0),
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    CHECK (created_at <= updated_at)
  )`,
];

/**
 * Initialize database tables (idempotent)
 */
export const initDb = async (): Promise<void> => {
  await getDb().batch(SCHEMA, "write");
  logDebug("Db", `schema ready (${SCHEMA.length} tables)`);
};
