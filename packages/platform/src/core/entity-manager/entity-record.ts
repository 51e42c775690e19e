/**
 * Entity Record
 *
 * A live instance of an entity: its storage column values plus access to
 * its relationships. Created by an EntityModel (create, hydrate,
 * findById, findAll), never directly.
 *
 *   record.get("title")                 column value
 *   record.set("title", "Dune")         column write
 *   await record.related("author")      lazy to-one read (cached)
 *   record.relate("author", author)     to-one write: cache + author_id
 *   await record.save()
 */

import type { PrimaryKeyValue, StoredRow } from "@dualmap/contracts";
import type { EntityModel } from "./entity-model.js";

export class EntityRecord {
  private values: StoredRow;
  private persisted: boolean;

  constructor(
    private readonly model: EntityModel,
    values: StoredRow,
    persisted: boolean
  ) {
    this.values = { ...values };
    this.persisted = persisted;
  }

  get entityName(): string {
    return this.model.entity.name;
  }

  /** The primary-key value, or null before storage assigned one */
  get primaryKey(): PrimaryKeyValue | null {
    const key = this.values[this.model.schema.primaryKey];
    return typeof key === "string" || typeof key === "number" ? key : null;
  }

  /** Whether the record was saved or loaded and not deleted since */
  get isPersisted(): boolean {
    return this.persisted;
  }

  /**
   * Reads a storage column (declared field or synthesized key).
   * @throws FieldAccessError for relationship and unknown fields
   */
  get(field: string): unknown {
    this.model.assertColumn(field);
    return this.values[field];
  }

  /**
   * Writes a field. Relationship fields are routed to relate(); setting
   * a synthesized key to a new value drops that relationship's cached
   * record.
   */
  set(field: string, value: unknown): this {
    this.model.assignField(this, field, value);
    return this;
  }

  /** Reads a to-one relationship, querying storage on first access only */
  async related(field: string): Promise<EntityRecord | null> {
    return this.model.readRelation(this, field);
  }

  /**
   * Writes a to-one relationship: the cached record and the key column
   * change together. null clears both.
   * @throws ReferenceAssignmentError for unsaved records or records of another entity
   */
  relate(field: string, value: EntityRecord | null): this {
    this.model.writeRelation(this, field, value);
    return this;
  }

  /** Whether a relationship has been resolved (or written) on this record */
  isResolved(field: string): boolean {
    return this.model.isResolved(this, field);
  }

  async save(): Promise<this> {
    await this.model.save(this);
    return this;
  }

  async delete(): Promise<boolean> {
    return this.model.delete(this);
  }

  /** Column values only; relationships are not included */
  toJSON(): StoredRow {
    return { ...this.values };
  }

  /** @internal Writes a column without side effects. */
  writeColumn(column: string, value: unknown): void {
    this.values[column] = value;
  }

  /** @internal Replaces the values with what storage now holds. */
  markPersisted(values: StoredRow): void {
    this.values = { ...values };
    this.persisted = true;
  }

  /** @internal */
  markDeleted(): void {
    this.persisted = false;
  }
}
