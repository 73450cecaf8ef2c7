/**
 * REST resource abstraction - ties together a table definition and its
 * input fields into typed CRUD operations.
 *
 * Usage:
 *   const itemsResource = defineResource({
 *     table: itemsTable,
 *     fields: itemFields,
 *     toInput: extractItemInput,
 *   });
 *
 *   const result = await itemsResource.create(body);
 *   if (!result.ok) return failureResponse(result);
 *   return jsonResponse({ status: "ok", data: result.row }, 201);
 *
 * Every failure is a typed result; only non-storage exceptions throw.
 */

import type { InValue } from "@libsql/client";
import { StorageError } from "#lib/db/errors.ts";
import type { Table } from "#lib/db/table.ts";
import type { Field, FieldErrors, FieldValues, RawInput } from "#lib/forms.ts";
import { validateForm } from "#lib/forms.ts";
import { ErrorCode, logError } from "#lib/logger.ts";

/** Success result with data */
type SuccessResult<T> = { ok: true } & T;

/** Validation failure: every offending field with its messages */
export type ValidationFailure = { ok: false; errors: FieldErrors };

/** Not found result */
export type NotFoundResult = { ok: false; notFound: true };

/** Storage layer failure */
export type StorageFailure = { ok: false; storageError: StorageError };

/** Any failure a resource operation can return */
export type FailureResult = ValidationFailure | NotFoundResult | StorageFailure;

/** Result type for list operations */
export type ListResult<Row> = SuccessResult<{ rows: Row[] }> | StorageFailure;

/** Result type for get operations */
export type GetResult<Row> =
  | SuccessResult<{ row: Row }>
  | NotFoundResult
  | StorageFailure;

/** Result type for create operations */
export type CreateResult<Row> =
  | SuccessResult<{ row: Row }>
  | ValidationFailure
  | StorageFailure;

/** Result type for update operations */
export type UpdateResult<Row> =
  | SuccessResult<{ row: Row }>
  | ValidationFailure
  | NotFoundResult
  | StorageFailure;

/** Result type for delete operations */
export type DeleteResult = SuccessResult<object> | NotFoundResult | StorageFailure;

/** Result type for input parsing */
export type ParseResult<Input> = SuccessResult<{ input: Input }> | ValidationFailure;

/** Extra validation beyond field rules (e.g. cross-field checks) */
type ValidateFn<Input> = (
  input: Input,
  id?: InValue,
) => Promise<FieldErrors | null>;

/**
 * Resource interface - provides typed CRUD operations
 */
export interface Resource<Row, Input> {
  readonly table: Table<Row, Input>;
  readonly fields: Field[];
  parseInput: (raw: RawInput) => Promise<ParseResult<Input>>;
  list: () => Promise<ListResult<Row>>;
  get: (id: InValue) => Promise<GetResult<Row>>;
  create: (raw: RawInput) => Promise<CreateResult<Row>>;
  update: (id: InValue, raw: RawInput) => Promise<UpdateResult<Row>>;
  delete: (id: InValue) => Promise<DeleteResult>;
}

/**
 * Configuration for defineResource
 */
export interface ResourceConfig<Row, Input> {
  table: Table<Row, Input>;
  fields: Field[];
  toInput: (values: FieldValues) => Input | Promise<Input>;
  /** Custom validation run after field rules pass. Return field errors or null. */
  validate?: ValidateFn<Input>;
}

const NOT_FOUND: NotFoundResult = { ok: false, notFound: true };

/**
 * Run storage work, turning a StorageError into a typed failure logged
 * against the item id when there is one.
 * Anything else is a programming error and propagates.
 */
const guardStorage = async <T>(
  fn: () => Promise<T | StorageFailure>,
  id?: InValue,
): Promise<T | StorageFailure> => {
  try {
    return await fn();
  } catch (error) {
    if (!(error instanceof StorageError)) throw error;
    logError({
      code: ErrorCode.DB_QUERY,
      itemId: typeof id === "number" ? id : undefined,
      detail: error.message,
    });
    return { ok: false, storageError: error };
  }
};

/** Validate input and convert to result type */
const validateAndParse = async <T>(
  raw: RawInput,
  fields: Field[],
  toInput: (values: FieldValues) => T | Promise<T>,
): Promise<ParseResult<T>> => {
  const validation = validateForm(raw, fields);
  return validation.valid
    ? { ok: true, input: await toInput(validation.values) }
    : { ok: false, errors: validation.errors };
};

/** Parse and validate input, returning parsed input or field errors */
const parseAndValidate = async <Input>(
  raw: RawInput,
  parseInput: (raw: RawInput) => Promise<ParseResult<Input>>,
  validate: ValidateFn<Input> | undefined,
  id?: InValue,
): Promise<ParseResult<Input>> => {
  const parsed = await parseInput(raw);
  if (!parsed.ok || !validate) return parsed;
  const errors = await validate(parsed.input, id);
  return errors ? { ok: false, errors } : parsed;
};

/**
 * Define a REST resource with typed CRUD operations.
 */
export const defineResource = <Row, Input>(
  config: ResourceConfig<Row, Input>,
): Resource<Row, Input> => {
  const { table, fields, toInput } = config;

  const parseInput = (raw: RawInput): Promise<ParseResult<Input>> =>
    validateAndParse(raw, fields, toInput);

  const list = (): Promise<ListResult<Row>> =>
    guardStorage<ListResult<Row>>(async () => ({ ok: true, rows: await table.findAll() }));

  const get = (id: InValue): Promise<GetResult<Row>> =>
    guardStorage<GetResult<Row>>(async () => {
      const row = await table.findById(id);
      return row ? { ok: true, row } : NOT_FOUND;
    }, id);

  const create = async (raw: RawInput): Promise<CreateResult<Row>> => {
    const result = await parseAndValidate(raw, parseInput, config.validate);
    if (!result.ok) return result;
    return guardStorage<CreateResult<Row>>(async () => ({
      ok: true,
      row: await table.insert(result.input),
    }));
  };

  // Full replace: every field is validated again, as on create
  const update = (id: InValue, raw: RawInput): Promise<UpdateResult<Row>> =>
    guardStorage<UpdateResult<Row>>(async () => {
      const existing = await table.findById(id);
      if (!existing) return NOT_FOUND;
      const result = await parseAndValidate(raw, parseInput, config.validate, id);
      if (!result.ok) return result;
      const row = await table.update(id, result.input);
      return row ? { ok: true, row } : NOT_FOUND;
    }, id);

  const deleteRow = (id: InValue): Promise<DeleteResult> =>
    guardStorage<DeleteResult>(async () =>
      (await table.deleteById(id)) ? { ok: true } : NOT_FOUND, id);

  return {
    table,
    fields,
    parseInput,
    list,
    get,
    create,
    update,
    delete: deleteRow,
  };
};
