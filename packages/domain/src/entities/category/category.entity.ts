/**
 * Category Entity
 *
 * Groups books and products. Keyed by UUID, so the foreign keys that
 * point here are UUID columns.
 */

import { defineEntity, t, hasMany } from "@dualmap/contracts";

export const CategoryEntity = defineEntity({
  name: "Category",
  description: "A shelf label shared by books and products.",

  fields: [
    { name: "id", type: t.uuid() },
    {
      name: "name",
      type: t.text(),
      validations: [{ min: 1, max: 100 }],
    },
    {
      name: "books",
      type: hasMany("Book", { reverse: "category" }),
    },
    {
      name: "products",
      type: hasMany("Product", { reverse: "category" }),
    },
  ],
});
