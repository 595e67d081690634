import { type z } from "zod";

// ============================================================
// Brand Keys for Nominal Typing
// ============================================================

/** Brand key for EntityType */
export const ENTITY_TYPE_BRAND = "__entityType" as const;

/** Brand key for RelationDeclaration */
export const RELATION_BRAND = "__relation" as const;

// ============================================================
// Entity Type
// ============================================================

export type EntitySchema = z.ZodObject<z.ZodRawShape>;

/**
 * An entity type definition.
 *
 * Created via `defineEntity()`. Names a kind of record and the Zod schema
 * its properties must satisfy.
 */
export type EntityType<
  K extends string = string,
  S extends EntitySchema = EntitySchema,
> = Readonly<{
  [ENTITY_TYPE_BRAND]: true;
  name: K;
  schema: S;
  description: string | undefined;
}>;

/**
 * Infer the props type from an EntityType.
 */
export type EntityProps<E extends EntityType> = z.infer<E["schema"]>;

export type RecordMeta = Readonly<{
  createdAt: string;
  updatedAt: string;
}>;

/**
 * A stored record with its props spread at the top level.
 */
export type EntityRecord<E extends EntityType = EntityType> = Readonly<{
  id: string;
  kind: E["name"];
  meta: RecordMeta;
}> &
  Readonly<EntityProps<E>>;

/**
 * Property names of a schema whose values may be null.
 * Only these can serve as a relation's foreign key.
 */
export type NullableKeys<S extends EntitySchema> = {
  [K in keyof z.infer<S>]-?: null extends z.infer<S>[K] ? K : never;
}[keyof z.infer<S>] &
  string;

// ============================================================
// Lifecycle Hooks
// ============================================================

/**
 * Hooks run by the destroy path of every record of a kind, including
 * records destroyed by purge tasks.
 *
 * `beforeDestroy` runs inside the destroying transaction; throwing aborts
 * the destruction. Throw `PermanentRecordError` to refuse it for good.
 * `afterDestroy` runs once the transaction has committed.
 */
export type DestroyHooks<E extends EntityType = EntityType> = Readonly<{
  beforeDestroy?(record: EntityRecord<E>): void | Promise<void>;
  afterDestroy?(record: EntityRecord<E>): void | Promise<void>;
}>;

export type EntityRegistration<E extends EntityType = EntityType> = Readonly<{
  type: E;
  hooks?: DestroyHooks<E>;
}>;

// ============================================================
// Relation Declaration
// ============================================================

/**
 * A parent-to-children relation whose foreign key lives on the child.
 *
 * Created via `defineRelation()`. Destroying a parent nullifies the
 * foreign key on every child and schedules the children for purge.
 */
export type RelationDeclaration<
  P extends EntityType = EntityType,
  C extends EntityType = EntityType,
> = Readonly<{
  [RELATION_BRAND]: true;
  parent: P;
  child: C;
  foreignKey: NullableKeys<C["schema"]> & string;
  /** Maximum identifiers per purge task for this relation */
  batchSize: number | undefined;
  description: string | undefined;
}>;

// ============================================================
// Type Guards
// ============================================================

export function isEntityType(value: unknown): value is EntityType {
  return (
    typeof value === "object" &&
    value !== null &&
    ENTITY_TYPE_BRAND in value &&
    (value as Record<string, unknown>)[ENTITY_TYPE_BRAND] === true
  );
}

export function isRelationDeclaration(
  value: unknown,
): value is RelationDeclaration {
  return (
    typeof value === "object" &&
    value !== null &&
    RELATION_BRAND in value &&
    (value as Record<string, unknown>)[RELATION_BRAND] === true
  );
}
