/**
 * Items table operations and input fields
 */

import { col, defineTable } from "#lib/db/table.ts";
import type { Field, FieldValues } from "#lib/forms.ts";
import type { Item } from "#lib/types.ts";

/** Item input fields for create/update (camelCase) */
export type ItemInput = {
  name: string;
  description: string;
};

/** Items table with CRUD operations */
export const itemsTable = defineTable<Item, ItemInput>({
  name: "items",
  primaryKey: "id",
  schema: {
    id: col.generated(),
    name: col.simple(),
    description: col.simple(),
    created_at: col.timestamp("created"),
    updated_at: col.timestamp("updated"),
  },
});

/** Validation schema for item input; update resubmits every field */
export const itemFields: Field[] = [
  { name: "name", label: "Name", type: "text", required: true },
  { name: "description", label: "Description", type: "textarea", required: true },
];

/** Extract item input from validated values (both fields are required text) */
export const extractItemInput = (values: FieldValues): ItemInput => ({
  name: String(values.name),
  description: String(values.description),
});
