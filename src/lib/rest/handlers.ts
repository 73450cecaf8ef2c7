/**
 * REST route handler factories - render resource results as JSON responses.
 *
 * Usage:
 *   const itemsResource = defineResource({...});
 *   const handleCreateItem = createHandler(itemsResource);
 *   const handleDeleteItem = deleteHandler(itemsResource);
 *
 * Status mapping: validation 400, not found 404, storage 503.
 */

import type { FailureResult, Resource } from "#lib/rest/resource.ts";
import { errorResponse, jsonResponse, notFoundResponse, parseBody } from "#routes/utils.ts";

/** Handler taking request only */
type RequestHandler = (request: Request) => Promise<Response>;

/** Handler taking request and ID */
type IdHandler = (request: Request, id: number) => Promise<Response>;

/**
 * Render any failed resource result
 */
export const failureResponse = (result: FailureResult): Response => {
  if ("notFound" in result) return notFoundResponse();
  if ("errors" in result) {
    return errorResponse("Validation failed", 400, { errors: result.errors });
  }
  return errorResponse("Storage unavailable", 503);
};

/** Render a successful payload */
const dataResponse = (data: unknown, status = 200): Response =>
  jsonResponse({ status: "ok", data }, status);

/** Create GET handler for the collection */
export const listHandler =
  <R, I>(resource: Resource<R, I>): RequestHandler =>
  async () => {
    const result = await resource.list();
    return result.ok ? dataResponse(result.rows) : failureResponse(result);
  };

/** Create GET handler for a single row */
export const getHandler =
  <R, I>(resource: Resource<R, I>): IdHandler =>
  async (_request, id) => {
    const result = await resource.get(id);
    return result.ok ? dataResponse(result.row) : failureResponse(result);
  };

/** Create POST handler */
export const createHandler =
  <R, I>(resource: Resource<R, I>): RequestHandler =>
  async (request) => {
    const parsed = await parseBody(request);
    if (!parsed.ok) return parsed.response;
    const result = await resource.create(parsed.body);
    return result.ok ? dataResponse(result.row, 201) : failureResponse(result);
  };

/** Create PUT handler for full-replace updates */
export const updateHandler =
  <R, I>(resource: Resource<R, I>): IdHandler =>
  async (request, id) => {
    const parsed = await parseBody(request);
    if (!parsed.ok) return parsed.response;
    const result = await resource.update(id, parsed.body);
    return result.ok ? dataResponse(result.row) : failureResponse(result);
  };

/** Create DELETE handler */
export const deleteHandler =
  <R, I>(resource: Resource<R, I>): IdHandler =>
  async (_request, id) => {
    const result = await resource.delete(id);
    return result.ok
      ? jsonResponse({ status: "ok", deleted: true })
      : failureResponse(result);
  };
