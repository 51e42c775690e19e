/**
 * Entity Registry
 *
 * Name → definition lookup for every declared entity. Relationship
 * targets are written as names, so schema derivation and lazy resolution
 * look them up here.
 *
 * A registry is owned by one EntityMapper. Entities are registered at
 * startup (single writer) and read afterwards; entries are never removed
 * in normal operation.
 */

import type { EntityDefinition } from "@dualmap/contracts";
import { UnregisteredTargetError } from "../errors/index.js";

export class EntityRegistry {
  /** All registered entities, keyed by entity name */
  private readonly entities = new Map<string, EntityDefinition>();

  /**
   * Registers an entity definition.
   * Registering the same definition twice is a no-op; a different
   * definition under a taken name throws.
   */
  register(entity: EntityDefinition): void {
    const existing = this.entities.get(entity.name);
    if (existing === entity) return;
    if (existing) {
      throw new Error(
        `Entity "${entity.name}" is already registered. Entity names must be unique.`
      );
    }
    this.entities.set(entity.name, entity);
  }

  /** Registers multiple entities at once */
  registerAll(entityList: readonly EntityDefinition[]): void {
    for (const entity of entityList) {
      this.register(entity);
    }
  }

  has(name: string): boolean {
    return this.entities.has(name);
  }

  get(name: string): EntityDefinition | undefined {
    return this.entities.get(name);
  }

  /**
   * Resolves a relationship target.
   * Throws UnregisteredTargetError naming the referencing field.
   */
  require(name: string, referencedBy: { entity: string; field: string }): EntityDefinition {
    const entity = this.entities.get(name);
    if (!entity) {
      throw new UnregisteredTargetError(referencedBy.entity, referencedBy.field, name);
    }
    return entity;
  }

  /** All registered entities, in registration order */
  getAll(): EntityDefinition[] {
    return Array.from(this.entities.values());
  }

  /** Removes every entity. Used for testing. */
  clear(): void {
    this.entities.clear();
  }
}
