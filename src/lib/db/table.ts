/**
 * Type-safe table abstraction for database operations
 *
 * Provides a declarative way to define tables with:
 * - Column mappings (camelCase input → snake_case DB)
 * - Generated columns (id) and table-managed timestamps
 * - Generic CRUD operations that return fresh copies of stored rows
 *
 * Client failures surface as StorageError; anything else (e.g. an
 * unbindable input value) propagates as thrown.
 */

import type { InValue } from "@libsql/client";
import { compact, filter, map, reduce } from "#fp";
import { getDb, queryAll, queryOne } from "#lib/db/client.ts";
import { withStorageError } from "#lib/db/errors.ts";
import { nowMs } from "#lib/now.ts";

/** Which writes stamp a timestamp column */
export type TimestampKind = "created" | "updated";

/**
 * Column definition for a table
 */
export type ColumnDef = {
  /** Whether this column is auto-generated (like id) */
  generated?: boolean;
  /**
   * Epoch-ms column owned by the table: "created" is set on insert,
   * "updated" on insert and bumped on every update
   */
  timestamp?: TimestampKind;
};

/**
 * Table schema definition
 * Keys are DB column names (snake_case), values are column definitions
 */
export type TableSchema<Row> = {
  [K in keyof Row]: ColumnDef;
};

/**
 * Convert snake_case to camelCase
 */
export const toCamelCase = (s: string): string =>
  s.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());

/**
 * Build input key mapping from DB columns
 * snake_case DB column → camelCase input key
 */
export const buildInputKeyMap = (columns: string[]): Record<string, string> =>
  reduce<string, Record<string, string>>(
    (acc, col) => {
      acc[col] = toCamelCase(col);
      return acc;
    },
    {},
  )(columns);

/**
 * Table definition with CRUD operations
 */
export interface Table<Row, Input> {
  name: string;
  primaryKey: keyof Row & string;
  schema: TableSchema<Row>;
  inputKeyMap: Record<string, string>;

  /** Insert a new row, returns the stored row */
  insert: (input: Input) => Promise<Row>;

  /** Replace a row's input columns by primary key, returns updated row or null if not found */
  update: (id: InValue, input: Input) => Promise<Row | null>;

  /** Find a row by primary key */
  findById: (id: InValue) => Promise<Row | null>;

  /** Delete a row by primary key, returns whether a row was removed */
  deleteById: (id: InValue) => Promise<boolean>;

  /** Find all rows in insertion (primary key) order */
  findAll: () => Promise<Row[]>;

  /** Map input keys to DB column values (absent keys are left out) */
  toDbValues: (input: Input | Partial<Input>) => Record<string, InValue>;
}

/** Values the libsql client can bind */
const isInValue = (value: unknown): value is InValue =>
  value === null ||
  typeof value === "string" ||
  typeof value === "number" ||
  typeof value === "bigint" ||
  typeof value === "boolean" ||
  value instanceof Uint8Array ||
  value instanceof ArrayBuffer ||
  value instanceof Date;

/** Build INSERT SQL returning the stored row */
const buildInsertSql = (name: string, columns: string[]): string => {
  if (columns.length === 0) return `INSERT INTO ${name} DEFAULT VALUES RETURNING *`;
  const placeholders = columns.map(() => "?").join(", ");
  return `INSERT INTO ${name} (${columns.join(", ")}) VALUES (${placeholders}) RETURNING *`;
};

/**
 * Build UPDATE SQL returning the stored row.
 * Updated-timestamps move to MAX(now, previous + 1) so they strictly
 * increase even when two updates land in the same millisecond.
 */
const buildUpdateSql = (
  name: string,
  columns: string[],
  stampColumns: string[],
  primaryKey: string,
): string => {
  const setClauses = [
    ...columns.map((col) => `${col} = ?`),
    ...stampColumns.map((col) => `${col} = MAX(?, ${col} + 1)`),
  ].join(", ");
  return `UPDATE ${name} SET ${setClauses} WHERE ${primaryKey} = ? RETURNING *`;
};

/**
 * Define a table with CRUD operations
 */
export const defineTable = <Row extends object, Input extends object = Row>(config: {
  name: string;
  primaryKey: keyof Row & string;
  schema: TableSchema<Row>;
}): Table<Row, Input> => {
  const { name, primaryKey, schema } = config;

  // Build column lists
  const allColumns = Object.keys(schema) as (keyof Row & string)[];
  const inputColumns = filter((col: keyof Row & string) =>
    !schema[col].generated && schema[col].timestamp === undefined
  )(allColumns);
  const stampedOn = (kinds: TimestampKind[]): string[] =>
    filter((col: keyof Row & string) => {
      const kind = schema[col].timestamp;
      return kind !== undefined && kinds.includes(kind);
    })(allColumns);
  const insertStamps = stampedOn(["created", "updated"]);
  const updateStamps = stampedOn(["updated"]);
  const inputKeyMap = buildInputKeyMap(inputColumns);

  // Input key for a DB column (inputKeyMap always has entry for inputColumns)
  const inputKey = (dbCol: string): string => inputKeyMap[dbCol] ?? dbCol;

  // Copy a driver row into a plain object holding only schema columns
  const fromDb = (row: Row): Row =>
    Object.fromEntries(
      map((col: keyof Row & string): [string, unknown] => [col, row[col]])(allColumns),
    ) as Row;

  const toDbValues = (input: Input | Partial<Input>): Record<string, InValue> => {
    const values: Map<string, unknown> = new Map(Object.entries(input));
    const entries = map((col: string): [string, InValue] | null => {
      const value = values.get(inputKey(col));
      if (value === undefined) return null;
      if (!isInValue(value)) {
        throw new TypeError(`Unsupported value for ${name}.${col}`);
      }
      return [col, value];
    })(inputColumns);
    return Object.fromEntries(compact(entries));
  };

  // Insert implementation: one timestamp shared by every stamped column
  const insert = async (input: Input): Promise<Row> => {
    const dbValues = toDbValues(input);
    const stamp = nowMs();
    for (const col of insertStamps) dbValues[col] = stamp;

    const columns = Object.keys(dbValues);
    const args = columns.map((col) => dbValues[col] ?? null);
    const row = await withStorageError("insert", name, () =>
      queryOne<Row>(buildInsertSql(name, columns), args));
    if (!row) throw new Error(`INSERT into ${name} returned no row`);
    return fromDb(row);
  };

  // Update implementation: full replace of the input columns
  const update = async (id: InValue, input: Input): Promise<Row | null> => {
    const dbValues = toDbValues(input);
    const columns = Object.keys(dbValues);
    const stamp = nowMs();
    const args: InValue[] = [
      ...columns.map((col) => dbValues[col] ?? null),
      ...updateStamps.map(() => stamp),
      id,
    ];

    const row = await withStorageError("update", name, () =>
      queryOne<Row>(buildUpdateSql(name, columns, updateStamps, primaryKey), args));
    return row ? fromDb(row) : null;
  };

  const findById = async (id: InValue): Promise<Row | null> => {
    const row = await withStorageError("findById", name, () =>
      queryOne<Row>(`SELECT * FROM ${name} WHERE ${primaryKey} = ?`, [id]));
    return row ? fromDb(row) : null;
  };

  const deleteById = async (id: InValue): Promise<boolean> => {
    const result = await withStorageError("delete", name, () =>
      getDb().execute({
        sql: `DELETE FROM ${name} WHERE ${primaryKey} = ?`,
        args: [id],
      }));
    return result.rowsAffected > 0;
  };

  const findAll = async (): Promise<Row[]> => {
    const rows = await withStorageError("findAll", name, () =>
      queryAll<Row>(`SELECT * FROM ${name} ORDER BY ${primaryKey} ASC`));
    return rows.map(fromDb);
  };

  return {
    name,
    primaryKey,
    schema,
    inputKeyMap,
    insert,
    update,
    findById,
    deleteById,
    findAll,
    toDbValues,
  };
};

/**
 * Helper to create column definitions
 */
export const col = {
  /** Auto-generated column (like id) */
  generated: (): ColumnDef => ({ generated: true }),

  /** Simple column with no special handling */
  simple: (): ColumnDef => ({}),

  /** Epoch-ms timestamp managed by the table */
  timestamp: (kind: TimestampKind): ColumnDef => ({ timestamp: kind }),
};
