/**
 * @dualmap/domain
 *
 * Sample entity definitions. The sync app registers them with the
 * mapper; tests use them as realistic fixtures.
 */

import type { EntityDefinition } from "@dualmap/contracts";
import { AuthorEntity } from "./entities/author/author.entity.js";
import { BookEntity } from "./entities/book/book.entity.js";
import { CategoryEntity } from "./entities/category/category.entity.js";
import { ProductEntity } from "./entities/product/product.entity.js";
import { EmployeeEntity } from "./entities/employee/employee.entity.js";

export { AuthorEntity, BookEntity, CategoryEntity, ProductEntity, EmployeeEntity };

/**
 * All entity definitions in this domain.
 * Order does not matter: targets only need to be registered before first use.
 */
export const entities: EntityDefinition[] = [
  BookEntity,
  AuthorEntity,
  CategoryEntity,
  ProductEntity,
  EmployeeEntity,
];
