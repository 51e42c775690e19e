/**
 * Book Entity
 *
 * A published work. Every book has an author; the category is optional
 * and cleared when the category is deleted.
 */

import { defineEntity, t, belongsTo } from "@dualmap/contracts";

export const BookEntity = defineEntity({
  name: "Book",
  description: "A published work written by an author, optionally filed under a category.",

  fields: [
    { name: "id", type: t.integer() },
    {
      name: "title",
      type: t.text(),
      validations: [{ min: 1, max: 300 }],
    },
    {
      name: "isbn",
      type: t.nullable(t.text()),
      description: "ISBN-13, digits only",
      validations: [{ pattern: "^\\d{13}$", message: "ISBN must be 13 digits" }],
    },
    {
      name: "status",
      type: t.enum(),
      options: ["draft", "published", "out_of_print"],
      defaultValue: "draft",
    },
    {
      name: "publishedOn",
      type: t.nullable(t.date()),
    },
    {
      name: "price",
      type: t.nullable(t.number()),
      validations: [{ min: 0 }],
    },
    {
      name: "author",
      type: belongsTo("Author", { reverse: "books", onDelete: "cascade" }),
    },
    {
      name: "category",
      type: belongsTo("Category", { optional: true, reverse: "books", onDelete: "set null" }),
    },
  ],
});
