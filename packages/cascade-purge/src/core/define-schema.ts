import { ConfigurationError } from "../errors/index";
import { validateBatchSize } from "./relation";
import {
  type EntityRegistration,
  type EntityType,
  isEntityType,
  isRelationDeclaration,
  type RelationDeclaration,
} from "./types";

// ============================================================
// Schema Definition Brand
// ============================================================

const SCHEMA_DEF_BRAND = "__schemaDef" as const;

// ============================================================
// Schema Definition Configuration
// ============================================================

export type SchemaDefaults = Readonly<{
  /** Default identifiers per purge task for relations without their own */
  batchSize?: number;
}>;

type SchemaDefConfig<
  TEntities extends Record<string, EntityRegistration>,
  TRelations extends Record<string, RelationDeclaration>,
> = Readonly<{
  id: string;
  entities: TEntities;
  relations?: TRelations;
  defaults?: SchemaDefaults;
}>;

// ============================================================
// Schema Definition Type
// ============================================================

export type SchemaDef<
  TEntities extends Record<string, EntityRegistration> = Record<
    string,
    EntityRegistration
  >,
  TRelations extends Record<string, RelationDeclaration> = Record<
    string,
    RelationDeclaration
  >,
> = Readonly<{
  [SCHEMA_DEF_BRAND]: true;
  id: string;
  entities: TEntities;
  relations: TRelations;
  defaults: Readonly<{ batchSize: number | undefined }>;
}>;

// ============================================================
// Type Helpers
// ============================================================

export type EntityKindNames<S extends SchemaDef> = keyof S["entities"] & string;

export type RelationNames<S extends SchemaDef> = keyof S["relations"] & string;

export type GetEntityType<
  S extends SchemaDef,
  K extends EntityKindNames<S>,
> = S["entities"][K]["type"];

// ============================================================
// Validation
// ============================================================

function validateEntities(entities: Record<string, EntityRegistration>): void {
  for (const [key, registration] of Object.entries(entities)) {
    if (!isEntityType(registration.type)) {
      throw new ConfigurationError(
        `Entity "${key}" is not an entity type created by defineEntity()`,
        { entity: key },
      );
    }
    if (registration.type.name !== key) {
      throw new ConfigurationError(
        `Entity registered as "${key}" is named "${registration.type.name}"`,
        { key, name: registration.type.name },
        {
          suggestion: `Register each entity under its own name: entities: { ${registration.type.name}: { type: ${registration.type.name} } }.`,
        },
      );
    }
  }
}

function requireRegistered(
  entities: Record<string, EntityRegistration>,
  relationName: string,
  role: "parent" | "child",
  type: EntityType,
): void {
  const registration = entities[type.name];
  if (registration?.type !== type) {
    throw new ConfigurationError(
      `Relation "${relationName}" ${role} "${type.name}" is not registered in the schema`,
      { relation: relationName, role, kind: type.name },
      {
        suggestion: `Add ${type.name} to entities in defineSchema().`,
      },
    );
  }
}

function validateRelations(
  entities: Record<string, EntityRegistration>,
  relations: Record<string, RelationDeclaration>,
): void {
  const foreignKeys = new Map<string, string>();

  for (const [name, relation] of Object.entries(relations)) {
    if (!isRelationDeclaration(relation)) {
      throw new ConfigurationError(
        `Relation "${name}" is not a relation created by defineRelation()`,
        { relation: name },
      );
    }
    requireRegistered(entities, name, "parent", relation.parent);
    requireRegistered(entities, name, "child", relation.child);

    // Two relations sharing one child column would nullify each other's children.
    const column = `${relation.child.name}.${relation.foreignKey}`;
    const existing = foreignKeys.get(column);
    if (existing !== undefined) {
      throw new ConfigurationError(
        `Relations "${existing}" and "${name}" both use foreign key ${column}`,
        { relations: [existing, name], foreignKey: column },
      );
    }
    foreignKeys.set(column, name);
  }
}

// ============================================================
// Define Schema Function
// ============================================================

/**
 * Declares the record kinds of a store and the relations between them.
 *
 * @example
 * ```typescript
 * const schema = defineSchema({
 *   id: "blog",
 *   entities: {
 *     Author: { type: Author },
 *     Post: { type: Post },
 *   },
 *   relations: {
 *     posts: defineRelation(Author, Post, { foreignKey: "authorId" }),
 *   },
 * });
 * ```
 */
export function defineSchema<
  TEntities extends Record<string, EntityRegistration>,
  TRelations extends Record<string, RelationDeclaration> = Record<
    string,
    never
  >,
>(config: SchemaDefConfig<TEntities, TRelations>): SchemaDef<TEntities, TRelations> {
  const relations = config.relations ?? ({} as TRelations);

  validateEntities(config.entities);
  validateRelations(config.entities, relations);
  validateBatchSize(config.defaults?.batchSize, `schema ${config.id}`);

  return Object.freeze({
    [SCHEMA_DEF_BRAND]: true as const,
    id: config.id,
    entities: config.entities,
    relations,
    defaults: Object.freeze({ batchSize: config.defaults?.batchSize }),
  });
}

export function isSchemaDef(value: unknown): value is SchemaDef {
  return (
    typeof value === "object" &&
    value !== null &&
    SCHEMA_DEF_BRAND in value &&
    (value as Record<string, unknown>)[SCHEMA_DEF_BRAND] === true
  );
}
