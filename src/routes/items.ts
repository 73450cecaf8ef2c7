/**
 * Item CRUD routes
 */

import { extractItemInput, itemFields, itemsTable } from "#lib/db/items.ts";
import {
  createHandler,
  defineResource,
  deleteHandler,
  getHandler,
  listHandler,
  updateHandler,
} from "#lib/rest/index.ts";
import { collection, createRouter, member } from "#routes/router.ts";

/** Items resource for REST operations */
export const itemsResource = defineResource({
  table: itemsTable,
  fields: itemFields,
  toInput: extractItemInput,
});

const handleListItems = listHandler(itemsResource);
const handleGetItem = getHandler(itemsResource);
const handleCreateItem = createHandler(itemsResource);
const handleUpdateItem = updateHandler(itemsResource);
const handleDeleteItem = deleteHandler(itemsResource);

/** Route item requests */
export const routeItems = createRouter([
  collection("GET", "/items", handleListItems),
  collection("POST", "/items", handleCreateItem),
  member("GET", "/items", handleGetItem),
  member("PUT", "/items", handleUpdateItem),
  member("DELETE", "/items", handleDeleteItem),
]);
