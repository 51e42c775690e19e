/**
 * Storage Adapter
 *
 * The relational-storage collaborator. The platform hands it derived
 * persistence schemas and flat column values; the adapter owns tables,
 * SQL and connections.
 *
 * Adapters never see relationship fields or runtime records, only
 * storage columns. Their errors (connectivity, constraint violations)
 * reach callers unmodified.
 */

import type { PersistenceSchema } from "./schema.js";

/** Primary-key value: integer keys are numbers, uuid/text keys are strings */
export type PrimaryKeyValue = string | number;

/** One stored row, keyed by column name */
export type StoredRow = Record<string, unknown>;

export interface StorageAdapter {
  /** Create the table and its columns if it does not exist */
  ensureTable(schema: PersistenceSchema): Promise<void>;

  /**
   * Add the schema's foreign-key constraints if missing.
   * Called once every referenced table exists.
   */
  ensureForeignKeys(schema: PersistenceSchema): Promise<void>;

  /**
   * Insert the row, or update it when a row with the same primary key exists.
   * Assigns a primary key when the row has none. Returns the key.
   */
  save(schema: PersistenceSchema, values: StoredRow): Promise<PrimaryKeyValue>;

  /** Find a row by primary key. Returns null when no row matches. */
  findById(schema: PersistenceSchema, id: PrimaryKeyValue): Promise<StoredRow | null>;

  /** All rows of the table */
  findAll(schema: PersistenceSchema): Promise<StoredRow[]>;

  /** Delete a row by primary key. Returns true if a row was deleted. */
  delete(schema: PersistenceSchema, id: PrimaryKeyValue): Promise<boolean>;
}
