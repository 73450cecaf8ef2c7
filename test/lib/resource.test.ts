import type { Client } from "@libsql/client";
import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import { StorageError } from "#lib/db/errors.ts";
import { extractItemInput, itemFields, itemsTable } from "#lib/db/items.ts";
import { col, defineTable } from "#lib/db/table.ts";
import { defineResource } from "#lib/rest/resource.ts";
import { itemsResource } from "#routes/items.ts";
import { createTestDb, resetDb } from "#test-utils";

describe("resource", () => {
  let client: Client;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(async () => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    client = await createTestDb();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetDb();
  });

  test("full lifecycle: create, list, update, delete, get", async () => {
    const created = await itemsResource.create({
      name: "Pen",
      description: "Blue ink pen",
    });
    if (!created.ok) throw new Error("create failed");
    const { id } = created.row;
    expect(id).toBeGreaterThan(0);

    const listed = await itemsResource.list();
    expect(listed).toEqual({ ok: true, rows: [created.row] });

    const updated = await itemsResource.update(id, {
      name: "Pencil",
      description: "HB pencil",
    });
    if (!updated.ok) throw new Error("update failed");
    expect(updated.row.name).toBe("Pencil");
    expect(updated.row.description).toBe("HB pencil");
    expect(updated.row.updated_at).toBeGreaterThan(updated.row.created_at);

    expect(await itemsResource.delete(id)).toEqual({ ok: true });
    expect(await itemsResource.get(id)).toEqual({ ok: false, notFound: true });
  });

  describe("parseInput", () => {
    test("validates without storing", async () => {
      expect(await itemsResource.parseInput({ name: " Pen ", description: "ink" })).toEqual({
        ok: true,
        input: { name: "Pen", description: "ink" },
      });
      expect(await itemsTable.findAll()).toEqual([]);
    });
  });

  describe("create", () => {
    test("reports every invalid field and stores nothing", async () => {
      const result = await itemsResource.create({ name: "", description: "  " });
      expect(result).toEqual({
        ok: false,
        errors: {
          name: ["Name is required"],
          description: ["Description is required"],
        },
      });
      expect(await itemsTable.findAll()).toEqual([]);
    });

    test("accepts form-encoded input", async () => {
      const result = await itemsResource.create(
        new URLSearchParams({ name: "Cup", description: "Ceramic" }),
      );
      expect(result.ok && result.row.name).toBe("Cup");
    });

    test("ignores caller-supplied id and timestamps", async () => {
      const result = await itemsResource.create({
        id: 500,
        name: "Cup",
        description: "Ceramic",
        createdAt: 1,
        created_at: 1,
      });
      if (!result.ok) throw new Error("create failed");
      expect(result.row.id).toBe(1);
      expect(result.row.created_at).toBeGreaterThan(1);
    });

    test("stores long names and descriptions in full", async () => {
      const name = "x".repeat(5000);
      const description = "y".repeat(20000);
      const result = await itemsResource.create({ name, description });
      if (!result.ok) throw new Error("create failed");
      expect(result.row.name).toBe(name);
      expect(result.row.description).toBe(description);
    });

    test("lets an unbindable input value propagate as a TypeError", async () => {
      await client.execute("CREATE TABLE blobs (id INTEGER PRIMARY KEY AUTOINCREMENT, payload TEXT)");
      const blobs = defineTable<{ id: number; payload: unknown }, { payload: unknown }>({
        name: "blobs",
        primaryKey: "id",
        schema: { id: col.generated(), payload: col.simple() },
      });
      const blobsResource = defineResource({
        table: blobs,
        fields: [{ name: "payload", label: "Payload", type: "text", required: true }],
        toInput: (values) => ({ payload: [String(values.payload)] }),
      });
      await expect(blobsResource.create({ payload: "data" })).rejects.toThrow(
        new TypeError("Unsupported value for blobs.payload"),
      );
      expect(errorSpy).not.toHaveBeenCalled();
    });
  });

  describe("get", () => {
    test("returns the stored row", async () => {
      const created = await itemsResource.create({ name: "Pen", description: "ink" });
      if (!created.ok) throw new Error("create failed");
      expect(await itemsResource.get(created.row.id)).toEqual({
        ok: true,
        row: created.row,
      });
    });

    test("reports unknown ids as not found", async () => {
      expect(await itemsResource.get(404)).toEqual({ ok: false, notFound: true });
    });
  });

  describe("update", () => {
    test("requires every field (full replace)", async () => {
      const created = await itemsResource.create({ name: "Pen", description: "ink" });
      if (!created.ok) throw new Error("create failed");
      const result = await itemsResource.update(created.row.id, { name: "Pencil" });
      expect(result).toEqual({
        ok: false,
        errors: { description: ["Description is required"] },
      });
      expect(await itemsResource.get(created.row.id)).toEqual({
        ok: true,
        row: created.row,
      });
    });

    test("reports unknown ids as not found before validating", async () => {
      expect(await itemsResource.update(77, {})).toEqual({ ok: false, notFound: true });
    });
  });

  describe("delete", () => {
    test("reports unknown ids as not found", async () => {
      expect(await itemsResource.delete(3)).toEqual({ ok: false, notFound: true });
    });
  });

  describe("custom validation", () => {
    const uniqueNameResource = defineResource({
      table: itemsTable,
      fields: itemFields,
      toInput: extractItemInput,
      validate: async (input, id) => {
        const clash = (await itemsTable.findAll()).find(
          (row) => row.name === input.name && row.id !== id,
        );
        return clash ? { name: ["Name is already in use"] } : null;
      },
    });

    test("runs after field rules pass", async () => {
      await uniqueNameResource.create({ name: "Pen", description: "ink" });
      expect(await uniqueNameResource.create({ name: "Pen", description: "other" }))
        .toEqual({ ok: false, errors: { name: ["Name is already in use"] } });
    });

    test("receives the id on update", async () => {
      const created = await uniqueNameResource.create({ name: "Pen", description: "ink" });
      if (!created.ok) throw new Error("create failed");
      const result = await uniqueNameResource.update(created.row.id, {
        name: "Pen",
        description: "new ink",
      });
      expect(result.ok).toBe(true);
    });
  });

  describe("storage failures", () => {
    test("become typed failures and are logged", async () => {
      await client.execute("DROP TABLE items");
      const result = await itemsResource.list();
      expect(result.ok).toBe(false);
      expect("storageError" in result && result.storageError).toBeInstanceOf(StorageError);
      expect(errorSpy).toHaveBeenCalledWith(
        expect.stringMatching(
          /^\[Error\] E_DB_QUERY detail="findAll on items failed: .*no such table: items"$/,
        ),
      );
    });

    test("name the item id for operations on one item", async () => {
      await client.execute("DROP TABLE items");
      await itemsResource.get(1);
      await itemsResource.update(2, { name: "Pen", description: "ink" });
      await itemsResource.delete(3);
      expect(errorSpy.mock.calls.map(([line]) => line)).toEqual([
        expect.stringMatching(/^\[Error\] E_DB_QUERY item=1 detail="findById on items failed: /),
        expect.stringMatching(/^\[Error\] E_DB_QUERY item=2 detail="findById on items failed: /),
        expect.stringMatching(/^\[Error\] E_DB_QUERY item=3 detail="delete on items failed: /),
      ]);
    });

    test("cover every operation", async () => {
      await client.execute("DROP TABLE items");
      const input = { name: "Pen", description: "ink" };
      for (const result of [
        await itemsResource.get(1),
        await itemsResource.create(input),
        await itemsResource.update(1, input),
        await itemsResource.delete(1),
      ]) {
        expect("storageError" in result).toBe(true);
      }
    });
  });
});
