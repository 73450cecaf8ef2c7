/**
 * REST module - unified CRUD operations for HTTP routes
 *
 * Provides:
 * - defineResource: Tie table definitions to input fields
 * - Handler factories: Typed route handlers rendering JSON
 *
 * Example:
 *   import { defineResource, createHandler } from '#lib/rest/index.ts';
 *
 *   const itemsResource = defineResource({
 *     table: itemsTable,
 *     fields: itemFields,
 *     toInput: extractItemInput,
 *   });
 *
 *   // Use with routes
 *   const handleCreate = createHandler(itemsResource);
 */

// Handler factories
export {
  createHandler,
  deleteHandler,
  failureResponse,
  getHandler,
  listHandler,
  updateHandler,
} from "./handlers.ts";

// Resource definition
export {
  type CreateResult,
  type DeleteResult,
  defineResource,
  type FailureResult,
  type GetResult,
  type ListResult,
  type ParseResult,
  type Resource,
  type ResourceConfig,
  type UpdateResult,
} from "./resource.ts";
