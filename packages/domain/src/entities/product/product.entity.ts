/**
 * Product Entity
 *
 * A sellable item. Its category is optional; deleting a category that
 * still has products is refused by the database.
 */

import { defineEntity, t, belongsTo } from "@dualmap/contracts";

export const ProductEntity = defineEntity({
  name: "Product",
  description: "A sellable item with a SKU and a price.",

  fields: [
    { name: "id", type: t.uuid() },
    {
      name: "name",
      type: t.text(),
      validations: [{ min: 1, max: 200 }],
    },
    {
      name: "sku",
      type: t.text(),
      description: "Stock keeping unit, e.g. KB-001",
      validations: [{ pattern: "^[A-Z]{2}-\\d{3}$", message: "SKU must look like KB-001" }],
    },
    {
      name: "price",
      type: t.number(),
      defaultValue: 0,
      validations: [{ min: 0 }],
    },
    {
      name: "active",
      type: t.boolean(),
      defaultValue: true,
    },
    {
      name: "tags",
      type: t.json(),
      defaultValue: [],
    },
    {
      name: "category",
      type: belongsTo("Category", { optional: true, reverse: "products", onDelete: "restrict" }),
    },
  ],
});
