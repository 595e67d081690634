// Entity factory
export { defineEntity, type DefineEntityOptions } from "./entity";

// Relation factory
export { defineRelation, type DefineRelationOptions } from "./relation";

// Schema definition
export {
  defineSchema,
  type EntityKindNames,
  type GetEntityType,
  isSchemaDef,
  type RelationNames,
  type SchemaDef,
  type SchemaDefaults,
} from "./define-schema";

// Core types
export {
  type DestroyHooks,
  type EntityProps,
  type EntityRecord,
  type EntityRegistration,
  type EntitySchema,
  type EntityType,
  isEntityType,
  isRelationDeclaration,
  type NullableKeys,
  type RecordMeta,
  type RelationDeclaration,
} from "./types";
