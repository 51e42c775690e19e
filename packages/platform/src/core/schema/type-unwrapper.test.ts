/**
 * Type Unwrapper: Test Suite
 *
 * Covers the fixed unwrap order (relation → nullable → list) and the
 * shapes that order rejects.
 */

import { describe, it, expect } from "vitest";
import { t, belongsTo, hasMany } from "@dualmap/contracts";
import { unwrapType } from "./type-unwrapper.js";
import { DefinitionError } from "../errors/index.js";

const at = { entity: "Book", field: "subject" };

describe("unwrapType", () => {
  it("returns a plain scalar unchanged", () => {
    expect(unwrapType(t.text(), at)).toEqual({
      bare: { kind: "scalar", type: "text" },
      isCollection: false,
      isNullable: false,
      relation: null,
    });
  });

  it("flags a nullable scalar", () => {
    const result = unwrapType(t.nullable(t.integer()), at);
    expect(result.isNullable).toBe(true);
    expect(result.bare).toEqual({ kind: "scalar", type: "integer" });
  });

  it("extracts relation metadata from a required to-one relation", () => {
    expect(unwrapType(belongsTo("Author", { reverse: "books" }), at)).toEqual({
      bare: { kind: "ref", entity: "Author" },
      isCollection: false,
      isNullable: false,
      relation: { reverse: "books" },
    });
  });

  it("flags a nullable to-one relation", () => {
    const result = unwrapType(belongsTo("Author", { optional: true }), at);
    expect(result.isNullable).toBe(true);
    expect(result.isCollection).toBe(false);
    expect(result.relation).toEqual({});
  });

  it("flags a to-many relation as a collection", () => {
    const result = unwrapType(hasMany("Book"), at);
    expect(result.isCollection).toBe(true);
    expect(result.isNullable).toBe(false);
    expect(result.bare).toEqual({ kind: "ref", entity: "Book" });
  });

  it("accepts the full Relation<Nullable<List<T>>> stack", () => {
    const result = unwrapType(t.relation(t.nullable(t.list(t.ref("Book")))), at);
    expect(result).toMatchObject({ isCollection: true, isNullable: true });
  });

  it("keeps forward references unresolved", () => {
    const result = unwrapType(belongsTo("NotDeclaredYet"), at);
    expect(result.bare).toEqual({ kind: "ref", entity: "NotDeclaredYet" });
  });

  it("rejects a collection of nullable relations", () => {
    expect(() => unwrapType(t.relation(t.list(t.nullable(t.ref("Book")))), at)).toThrow(
      DefinitionError
    );
  });

  it("rejects doubled wrappers", () => {
    expect(() => unwrapType(t.nullable(t.nullable(t.text())), at)).toThrow(DefinitionError);
    expect(() => unwrapType(t.relation(t.relation(t.ref("Author"))), at)).toThrow(
      DefinitionError
    );
  });

  it("rejects relation metadata below nullable", () => {
    expect(() => unwrapType(t.nullable(t.relation(t.ref("Author"))), at)).toThrow(
      'field "subject" has a malformed type expression Nullable<Relation<Author>>'
    );
  });
});
