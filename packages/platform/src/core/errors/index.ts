/**
 * Mapper Errors
 *
 * Every failure raised by the mapper is one of these classes. Each carries
 * the entity (and where relevant the field and target) it concerns, so
 * callers can react without parsing messages.
 *
 * Storage adapter errors are not wrapped. They reach the caller as thrown.
 */

/**
 * An entity definition cannot be turned into a persistence schema:
 * malformed type expression, missing or invalid primary key,
 * synthesized column collision, invalid identifier.
 */
export class DefinitionError extends Error {
  public readonly entity: string;
  public readonly field: string | null;

  constructor(entity: string, message: string, field: string | null = null) {
    super(`Invalid definition for entity "${entity}": ${message}`);
    this.name = "DefinitionError";
    this.entity = entity;
    this.field = field;
  }
}

/**
 * A relationship points at an entity that has not been registered.
 * Raised when the target is first needed, never at declaration.
 */
export class UnregisteredTargetError extends Error {
  public readonly entity: string;
  public readonly field: string;
  public readonly target: string;

  constructor(entity: string, field: string, target: string) {
    super(
      `Relationship "${entity}.${field}" targets entity "${target}", which is not registered. ` +
        `Register "${target}" before using "${entity}".`
    );
    this.name = "UnregisteredTargetError";
    this.entity = entity;
    this.field = field;
    this.target = target;
  }
}

/**
 * A required to-one relationship has no foreign key at write time.
 * Raised before any storage call.
 */
export class RequiredRelationshipError extends Error {
  public readonly entity: string;
  public readonly field: string;
  public readonly target: string;

  constructor(entity: string, field: string, target: string) {
    super(
      `Required relationship "${field}" on ${entity} cannot be empty. ` +
        `Provide a saved ${target} before saving.`
    );
    this.name = "RequiredRelationshipError";
    this.entity = entity;
    this.field = field;
    this.target = target;
  }
}

/**
 * A value assigned to a relationship field cannot be referenced:
 * it has no primary key yet, or it belongs to another entity.
 */
export class ReferenceAssignmentError extends Error {
  public readonly entity: string;
  public readonly field: string;

  constructor(entity: string, field: string, reason: string) {
    super(`Cannot assign "${entity}.${field}": ${reason}`);
    this.name = "ReferenceAssignmentError";
    this.entity = entity;
    this.field = field;
  }
}

/** Delete was called on a record that was never saved */
export class RecordNotSavedError extends Error {
  public readonly entity: string;

  constructor(entity: string) {
    super(`Cannot delete an unsaved ${entity}. Save it first.`);
    this.name = "RecordNotSavedError";
    this.entity = entity;
  }
}

/**
 * A record field was accessed the wrong way: relationship fields are read
 * with related() and written with relate(), columns with get() and set().
 */
export class FieldAccessError extends Error {
  public readonly entity: string;
  public readonly field: string;

  constructor(entity: string, field: string, detail: string) {
    super(`Cannot access "${entity}.${field}": ${detail}`);
    this.name = "FieldAccessError";
    this.entity = entity;
    this.field = field;
  }
}
