import type { PurgeBackend, TransactionBackend } from "../backend/types";
import { type SchemaDef } from "../core/define-schema";
import type { EntityRegistration } from "../core/types";
import { KindNotFoundError, RelationNotFoundError } from "../errors";
import { nullifyChildren } from "../purge/nullify";
import { FrozenMap } from "./frozen-map";

// ============================================================
// Types
// ============================================================

/**
 * What to do with the children of a relation when their parent goes.
 *
 * `nullify` detaches all children of a parent inside the parent's
 * transaction. `purge` destroys one detached child; it resolves to false
 * when the child was already gone.
 */
export type RelationHandlers = Readonly<{
  nullify: (tx: TransactionBackend, parentId: string) => Promise<readonly string[]>;
  purge: (backend: PurgeBackend, childId: string) => Promise<boolean>;
}>;

/**
 * A relation as resolved for one schema.
 */
export type RelationDefinition = Readonly<{
  name: string;
  parentKind: string;
  childKind: string;
  foreignKey: string;
  /** Identifiers per purge task; undefined falls back to the store configuration */
  batchSize: number | undefined;
  description: string | undefined;
}>;

export type RelationEntry = RelationDefinition &
  Readonly<{
    handlers: RelationHandlers;
  }>;

export type RelationHandlerFactory = (
  relation: RelationDefinition,
  schemaId: string,
) => RelationHandlers;

/**
 * Immutable lookup of the relations declared by a schema.
 */
export type RelationRegistry = Readonly<{
  schemaId: string;
  /** Every relation, keyed by name */
  relations: ReadonlyMap<string, RelationEntry>;
  entities: ReadonlyMap<string, EntityRegistration>;
  /** @throws RelationNotFoundError */
  get: (parentKind: string, name: string) => RelationEntry;
  has: (parentKind: string, name: string) => boolean;
  /** Relations whose parent is `kind`, in declaration order */
  forParent: (kind: string) => readonly RelationEntry[];
  /** Relations whose child is `kind`, in declaration order */
  forChild: (kind: string) => readonly RelationEntry[];
  /** @throws KindNotFoundError */
  getEntity: (kind: string) => EntityRegistration;
}>;

// ============================================================
// Default Handlers
// ============================================================

/**
 * Nullifies with one bulk statement and purges by deleting the row.
 *
 * Stores replace `purge` with their full destroy path so children run
 * their own hooks and relations.
 */
export function defaultRelationHandlers(
  relation: RelationDefinition,
  schemaId: string,
): RelationHandlers {
  const target = {
    schemaId,
    childKind: relation.childKind,
    foreignKey: relation.foreignKey,
  };

  return {
    nullify: (tx, parentId) => nullifyChildren(tx, target, parentId),
    purge: (backend, childId) =>
      backend.deleteRecord({ schemaId, kind: relation.childKind, id: childId }),
  };
}

// ============================================================
// Registry Builder
// ============================================================

function relationKey(parentKind: string, name: string): string {
  return `${parentKind}\u0000${name}`;
}

function groupBy(
  entries: readonly RelationEntry[],
  key: (entry: RelationEntry) => string,
): FrozenMap<string, readonly RelationEntry[]> {
  const groups = new Map<string, RelationEntry[]>();
  for (const entry of entries) {
    const group = groups.get(key(entry));
    if (group === undefined) {
      groups.set(key(entry), [entry]);
    } else {
      group.push(entry);
    }
  }
  return new FrozenMap(
    [...groups].map(([kind, group]) => [kind, Object.freeze(group)] as const),
  );
}

/**
 * Builds the relation registry for a schema.
 *
 * Built once per store; every lookup afterwards is a map read.
 */
export function buildRelationRegistry(
  schema: SchemaDef,
  createHandlers: RelationHandlerFactory = defaultRelationHandlers,
): RelationRegistry {
  const entries: RelationEntry[] = Object.entries(schema.relations).map(
    ([name, declaration]) => {
      const definition: RelationDefinition = {
        name,
        parentKind: declaration.parent.name,
        childKind: declaration.child.name,
        foreignKey: declaration.foreignKey,
        batchSize: declaration.batchSize ?? schema.defaults.batchSize,
        description: declaration.description,
      };
      return Object.freeze({
        ...definition,
        handlers: Object.freeze(createHandlers(definition, schema.id)),
      });
    },
  );

  const relations = new FrozenMap(entries.map((entry) => [entry.name, entry] as const));
  const byParentAndName = new FrozenMap(
    entries.map((entry) => [relationKey(entry.parentKind, entry.name), entry] as const),
  );
  const byParent = groupBy(entries, (entry) => entry.parentKind);
  const byChild = groupBy(entries, (entry) => entry.childKind);
  const entities = new FrozenMap(Object.entries(schema.entities));

  return Object.freeze({
    schemaId: schema.id,
    relations,
    entities,

    get(parentKind: string, name: string): RelationEntry {
      const entry = byParentAndName.get(relationKey(parentKind, name));
      if (entry === undefined) {
        throw new RelationNotFoundError(parentKind, name);
      }
      return entry;
    },

    has(parentKind: string, name: string): boolean {
      return byParentAndName.has(relationKey(parentKind, name));
    },

    forParent(kind: string): readonly RelationEntry[] {
      return byParent.get(kind) ?? [];
    },

    forChild(kind: string): readonly RelationEntry[] {
      return byChild.get(kind) ?? [];
    },

    getEntity(kind: string): EntityRegistration {
      const registration = entities.get(kind);
      if (registration === undefined) {
        throw new KindNotFoundError(kind);
      }
      return registration;
    },
  });
}
