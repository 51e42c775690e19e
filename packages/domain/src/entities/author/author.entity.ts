/**
 * Author Entity
 *
 * A person who writes books. Owns no foreign keys; the Book side holds
 * `author_id`.
 */

import { defineEntity, t, hasMany } from "@dualmap/contracts";

export const AuthorEntity = defineEntity({
  name: "Author",
  description: "A person credited with writing one or more books.",

  fields: [
    { name: "id", type: t.integer() },
    {
      name: "name",
      type: t.text(),
      description: "Full name as printed on the cover",
      validations: [{ min: 1, max: 200 }],
    },
    {
      name: "email",
      type: t.nullable(t.email()),
      description: "Contact address for the author or their agent",
    },
    {
      name: "books",
      type: hasMany("Book", { reverse: "author" }),
      description: "Books this author wrote",
    },
  ],
});
