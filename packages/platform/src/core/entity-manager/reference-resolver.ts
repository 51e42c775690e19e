/**
 * Lazy Reference Resolver
 *
 * One resolver per lazy to-one relationship of an entity. It owns the
 * per-record cache slot for that field:
 *
 *   undefined            never resolved
 *   { value: null }      resolved, nothing there (no key, or dangling key)
 *   { value: record }    resolved to a record
 *
 * Reads consult the slot first and only query storage on a miss.
 * Writes replace the slot; the model updates the foreign key alongside.
 * Slots live in a WeakMap keyed by record, so they are private to each
 * record and disappear with it.
 */

import type { Logger, PrimaryKeyValue, RelationshipDescriptor } from "@dualmap/contracts";
import type { EntityModel } from "./entity-model.js";
import type { EntityRecord } from "./entity-record.js";

export type CacheSlot = { value: EntityRecord | null } | undefined;

export class ReferenceResolver {
  private readonly slots = new WeakMap<EntityRecord, { value: EntityRecord | null }>();
  private readonly pending = new WeakMap<EntityRecord, Promise<EntityRecord | null>>();

  constructor(
    readonly descriptor: RelationshipDescriptor,
    /** Column holding the key, e.g. "author_id" */
    readonly foreignKey: string,
    /** Looks up the target model; throws UnregisteredTargetError */
    private readonly targetModel: () => EntityModel,
    private readonly logger: Logger
  ) {}

  slot(record: EntityRecord): CacheSlot {
    return this.slots.get(record);
  }

  isResolved(record: EntityRecord): boolean {
    return this.slots.has(record);
  }

  /**
   * Returns the related record, resolving it on first read.
   * Concurrent first reads share one query.
   */
  async read(record: EntityRecord): Promise<EntityRecord | null> {
    const cached = this.slots.get(record);
    if (cached) return cached.value;

    const key = this.keyOf(record);
    if (key === null) {
      this.slots.set(record, { value: null });
      return null;
    }

    const inFlight = this.pending.get(record);
    if (inFlight) return inFlight;

    const load = this.load(record, key);
    this.pending.set(record, load);
    try {
      return await load;
    } finally {
      if (this.pending.get(record) === load) this.pending.delete(record);
    }
  }

  /** Replaces the cached value. The caller updates the key column. */
  write(record: EntityRecord, value: EntityRecord | null): void {
    this.pending.delete(record);
    this.slots.set(record, { value });
  }

  /** Forgets the cached value, e.g. after the key column was set directly */
  invalidate(record: EntityRecord): void {
    this.pending.delete(record);
    this.slots.delete(record);
  }

  private keyOf(record: EntityRecord): PrimaryKeyValue | null {
    const key = record.get(this.foreignKey);
    if (key === undefined || key === null) return null;
    if (typeof key === "string" || typeof key === "number") return key;
    throw new TypeError(
      `"${record.entityName}.${this.foreignKey}" holds a ${typeof key}; expected a string or number key.`
    );
  }

  private async load(record: EntityRecord, key: PrimaryKeyValue): Promise<EntityRecord | null> {
    const found = await this.targetModel().findById(key);

    // A write or a key change during the query wins over the loaded value
    const current = this.slots.get(record);
    if (current) return current.value;
    if (this.keyOf(record) !== key) {
      this.pending.delete(record);
      return this.read(record);
    }

    this.slots.set(record, { value: found });
    this.logger.debug("Resolved relationship", {
      entity: record.entityName,
      field: this.descriptor.fieldName,
      target: this.descriptor.target,
      key,
      found: found !== null,
    });
    return found;
  }
}
