/**
 * Test utilities for the item store
 */

import { type Client, createClient } from "@libsql/client";
import { setDb } from "#lib/db/client.ts";
import { initDb } from "#lib/db/migrations/index.ts";

// ---------------------------------------------------------------------------
// Cached test database infrastructure
// Reuses one in-memory SQLite client across tests, clearing rows in between.
// ---------------------------------------------------------------------------

/** Cached in-memory SQLite client, reused across tests */
let cachedClient: Client | null = null;

/** Clear all data tables and reset autoincrement counters */
const clearDataTables = async (client: Client): Promise<void> => {
  await client.execute("DELETE FROM items");
  // Reset autoincrement counters so IDs start from 1 (table may not exist yet)
  await client.execute(
    "DELETE FROM sqlite_sequence WHERE EXISTS (SELECT 1 FROM sqlite_master WHERE type='table' AND name='sqlite_sequence')",
  );
};

/** Check if the cached client's schema is still intact */
const isSchemaIntact = async (client: Client): Promise<boolean> => {
  const result = await client.execute(
    "SELECT name FROM sqlite_master WHERE type='table' AND name='items'",
  );
  return result.rows.length > 0;
};

/**
 * Create an in-memory database for testing.
 * Reuses the cached client when its schema is intact, clearing all data.
 */
export const createTestDb = async (): Promise<Client> => {
  if (cachedClient && (await isSchemaIntact(cachedClient))) {
    setDb(cachedClient);
    await clearDataTables(cachedClient);
    return cachedClient;
  }

  const client = createClient({ url: ":memory:" });
  cachedClient = client;
  setDb(client);
  await initDb();
  return client;
};

/**
 * Detach the database client so the next getDb() builds a fresh one
 */
export const resetDb = (): void => {
  setDb(null);
};

/**
 * Create a mock Request object
 */
export const mockRequest = (path: string, options: RequestInit = {}): Request =>
  new Request(`http://localhost${path}`, options);

/**
 * Create a mock request with a JSON body (POST unless a method is given)
 */
export const mockJsonRequest = (
  path: string,
  data: unknown,
  method = "POST",
): Request =>
  mockRequest(path, {
    method,
    headers: { "content-type": "application/json" },
    body: JSON.stringify(data),
  });

/**
 * Create a mock request with form data (POST unless a method is given)
 */
export const mockFormRequest = (
  path: string,
  data: Record<string, string>,
  method = "POST",
): Request =>
  mockRequest(path, {
    method,
    headers: { "content-type": "application/x-www-form-urlencoded" },
    body: new URLSearchParams(data).toString(),
  });

/**
 * Parse a JSON response body as a plain record
 */
export const responseJson = async (
  response: Response,
): Promise<Record<string, unknown>> => {
  const body: unknown = await response.json();
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new Error(`Expected a JSON object, got ${JSON.stringify(body)}`);
  }
  return Object.fromEntries(Object.entries(body));
};
