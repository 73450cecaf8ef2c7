/**
 * Database client setup and core utilities
 */

import { type Client, createClient, type InValue, type ResultSet } from "@libsql/client";
import { lazyRef } from "#fp";
import { getDbToken, getDbUrl } from "#lib/config.ts";

const createDbClient = (): Client =>
  createClient({
    url: getDbUrl(),
    authToken: getDbToken(),
  });

const [dbGetter, dbSetter] = lazyRef(createDbClient);

/**
 * Get or create database client
 */
export const getDb = (): Client => dbGetter();

/**
 * Set database client (for testing)
 */
export const setDb = (client: Client | null): void => dbSetter(client);

/** Cast libsql ResultSet rows to a typed array (single centralized assertion) */
export const resultRows = <T>(result: ResultSet): T[] =>
  result.rows as unknown as T[];

/** Query single row, returning null if not found */
export const queryOne = async <T>(
  sql: string,
  args: InValue[],
): Promise<T | null> => {
  const result = await getDb().execute({ sql, args });
  return resultRows<T>(result)[0] ?? null;
};

/** Query all rows, returning a typed array */
export const queryAll = async <T>(
  sql: string,
  args: InValue[] = [],
): Promise<T[]> => {
  const result = await getDb().execute({ sql, args });
  return resultRows<T>(result);
};
