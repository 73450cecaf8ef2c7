import { describe, expect, test } from "vitest";
import { collection, createRouter, member } from "#routes/router.ts";
import { jsonResponse, normalizePath } from "#routes/utils.ts";
import { mockRequest } from "#test-utils";

const router = createRouter([
  collection("GET", "/items", () => jsonResponse({ route: "list" })),
  member("GET", "/items", (_request, id) => jsonResponse({ route: "get", id })),
  member("DELETE", "/items", (_request, id) => jsonResponse({ route: "delete", id })),
  collection("GET", "/v1.0", () => jsonResponse({ route: "version" })),
]);

const route = async (method: string, path: string): Promise<unknown> => {
  const response = await router(mockRequest(path, { method }), path, method);
  return response ? response.json() : null;
};

describe("router", () => {
  test("matches collection paths", async () => {
    expect(await route("GET", "/items")).toEqual({ route: "list" });
  });

  test("passes member ids as numbers", async () => {
    expect(await route("GET", "/items/42")).toEqual({ route: "get", id: 42 });
  });

  test("matches by method", async () => {
    expect(await route("DELETE", "/items/3")).toEqual({ route: "delete", id: 3 });
    expect(await route("PUT", "/items/3")).toBeNull();
    expect(await route("POST", "/items")).toBeNull();
  });

  test("member ids only match digits", async () => {
    expect(await route("GET", "/items/abc")).toBeNull();
    expect(await route("GET", "/items/-1")).toBeNull();
    expect(await route("GET", "/items/1.5")).toBeNull();
  });

  test("does not match partial paths", async () => {
    expect(await route("GET", "/items/1/extra")).toBeNull();
    expect(await route("GET", "/itemsx")).toBeNull();
    expect(await route("GET", "/x/items")).toBeNull();
  });

  test("treats path characters literally", async () => {
    expect(await route("GET", "/v1.0")).toEqual({ route: "version" });
    expect(await route("GET", "/v1x0")).toBeNull();
  });
});

describe("normalizePath", () => {
  test("strips trailing slashes", () => {
    expect(normalizePath("/items/")).toBe("/items");
    expect(normalizePath("/items//")).toBe("/items");
  });

  test("keeps the root path", () => {
    expect(normalizePath("/")).toBe("/");
  });
});
