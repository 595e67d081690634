import { z } from "zod";

import { ConfigurationError } from "../errors/index";
import {
  type EntityType,
  type NullableKeys,
  RELATION_BRAND,
  type RelationDeclaration,
} from "./types";

const FOREIGN_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type DefineRelationOptions<C extends EntityType> = Readonly<{
  /** Child property holding the parent's ID. Must accept null. */
  foreignKey: NullableKeys<C["schema"]> & string;
  batchSize?: number;
  description?: string;
}>;

function validateForeignKey(
  parent: EntityType,
  child: EntityType,
  foreignKey: string,
): void {
  const context = {
    parent: parent.name,
    child: child.name,
    foreignKey,
  };

  if (!FOREIGN_KEY_PATTERN.test(foreignKey)) {
    throw new ConfigurationError(
      `Foreign key "${foreignKey}" on "${child.name}" is not a plain identifier`,
      context,
      {
        suggestion: `Foreign keys must match ${FOREIGN_KEY_PATTERN.source} so they can be addressed as a JSON path.`,
      },
    );
  }

  const field = child.schema.shape[foreignKey];
  if (field === undefined) {
    throw new ConfigurationError(
      `Foreign key "${foreignKey}" is not a property of "${child.name}"`,
      { ...context, properties: Object.keys(child.schema.shape) },
      {
        suggestion: `Add "${foreignKey}" to the ${child.name} schema, e.g. z.string().nullable().`,
      },
    );
  }

  if (!z.safeParse(field, null).success) {
    throw new ConfigurationError(
      `Foreign key "${child.name}.${foreignKey}" does not accept null`,
      context,
      {
        suggestion: `Declare the property as nullable, e.g. z.string().nullable(), so orphaned children pass validation.`,
      },
    );
  }
}

export function validateBatchSize(batchSize: number | undefined, name: string): void {
  if (batchSize === undefined) return;
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigurationError(
      `Batch size for "${name}" must be a positive integer, got ${batchSize}`,
      { relation: name, batchSize },
    );
  }
}

/**
 * Declares that records of `child` belong to a record of `parent`.
 *
 * @example
 * ```typescript
 * const authorPosts = defineRelation(Author, Post, {
 *   foreignKey: "authorId",
 *   batchSize: 100,
 * });
 * ```
 */
export function defineRelation<P extends EntityType, C extends EntityType>(
  parent: P,
  child: C,
  options: DefineRelationOptions<C>,
): RelationDeclaration<P, C> {
  validateForeignKey(parent, child, options.foreignKey);
  validateBatchSize(options.batchSize, `${parent.name} -> ${child.name}`);

  return Object.freeze({
    [RELATION_BRAND]: true as const,
    parent,
    child,
    foreignKey: options.foreignKey,
    batchSize: options.batchSize,
    description: options.description,
  });
}
