/**
 * Entity Definition: Test Suite
 *
 * Validates that defineEntity returns the declared definition and
 * freezes it, so nothing derived later can change the declaration.
 */

import { describe, it, expect } from "vitest";
import { defineEntity, type EntityDefinition } from "./entity.js";
import { t, belongsTo } from "./type-expression.js";

describe("defineEntity", () => {
  it("returns the same object passed in", () => {
    const input: EntityDefinition = {
      name: "Author",
      description: "Someone who writes books",
      fields: [
        { name: "id", type: t.integer() },
        { name: "name", type: t.text() },
      ],
    };

    const result = defineEntity(input);
    expect(result).toBe(input);
  });

  it("freezes the definition, its fields and their type expressions", () => {
    const entity = defineEntity({
      name: "Book",
      fields: [
        { name: "id", type: t.integer() },
        { name: "author", type: belongsTo("Author", { reverse: "books" }) },
      ],
    });

    expect(Object.isFrozen(entity)).toBe(true);
    expect(Object.isFrozen(entity.fields)).toBe(true);
    expect(Object.isFrozen(entity.fields[1])).toBe(true);
    expect(Object.isFrozen(entity.fields[1].type)).toBe(true);
  });

  it("rejects later mutation", () => {
    const entity = defineEntity({
      name: "Tag",
      fields: [{ name: "id", type: t.integer() }],
    });

    expect(() => {
      entity.fields.push({ name: "label", type: t.text() });
    }).toThrow(TypeError);
  });

  it("preserves optional settings", () => {
    const entity = defineEntity({
      name: "Product",
      tableName: "catalog_products",
      primaryKey: "sku",
      fields: [
        { name: "sku", type: t.text() },
        {
          name: "status",
          type: t.enum(),
          options: ["draft", "live"],
          defaultValue: "draft",
          validations: [{ min: 1 }],
        },
      ],
    });

    expect(entity.tableName).toBe("catalog_products");
    expect(entity.primaryKey).toBe("sku");
    expect(entity.fields[1].defaultValue).toBe("draft");
  });
});
