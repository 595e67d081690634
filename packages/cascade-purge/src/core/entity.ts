import { type z } from "zod";

import { ConfigurationError } from "../errors/index";
import { ENTITY_TYPE_BRAND, type EntityType } from "./types";

// ============================================================
// Reserved Keys
// ============================================================

/**
 * Property names reserved for the record envelope.
 * Props are spread next to these on every EntityRecord.
 */
const RESERVED_RECORD_KEYS = new Set(["id", "kind", "meta"]);

// ============================================================
// Entity Factory
// ============================================================

export type DefineEntityOptions<S extends z.ZodObject<z.ZodRawShape>> = Readonly<{
  /** Zod schema for record properties */
  schema: S;
  description?: string;
}>;

function validateSchemaKeys(
  schema: z.ZodObject<z.ZodRawShape>,
  name: string,
): void {
  const conflicts = Object.keys(schema.shape).filter((key) =>
    RESERVED_RECORD_KEYS.has(key),
  );
  if (conflicts.length > 0) {
    throw new ConfigurationError(
      `Entity "${name}" schema contains reserved property names: ${conflicts.join(", ")}`,
      { entity: name, conflicts, reservedKeys: [...RESERVED_RECORD_KEYS] },
      {
        suggestion: `Rename the conflicting properties. Reserved names (id, kind, meta) are added automatically to all records.`,
      },
    );
  }
}

/**
 * Creates an entity type definition.
 *
 * @example
 * ```typescript
 * const Post = defineEntity("Post", {
 *   schema: z.object({
 *     title: z.string().min(1),
 *     authorId: z.string().nullable(),
 *   }),
 * });
 * ```
 */
export function defineEntity<
  K extends string,
  S extends z.ZodObject<z.ZodRawShape>,
>(name: K, options: DefineEntityOptions<S>): EntityType<K, S> {
  validateSchemaKeys(options.schema, name);

  return Object.freeze({
    [ENTITY_TYPE_BRAND]: true as const,
    name,
    schema: options.schema,
    description: options.description,
  });
}
