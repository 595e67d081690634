/**
 * Row Mappers for Store
 *
 * Transforms record rows into typed records.
 */
import { z } from "zod";

import type { RecordRow } from "../backend/types";
import type { EntityRecord } from "../core/types";
import { DatabaseOperationError } from "../errors";

const propsSchema = z.record(z.string(), z.unknown());

// Reserved keys that cannot be overwritten by stored props
const RESERVED_RECORD_KEYS = new Set(["id", "kind", "meta"]);

/**
 * Filters out reserved keys from props to prevent runtime collisions.
 */
function filterReservedKeys(
  props: Record<string, unknown>,
): Record<string, unknown> {
  const filtered: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(props)) {
    if (!RESERVED_RECORD_KEYS.has(key)) {
      filtered[key] = value;
    }
  }
  return filtered;
}

/**
 * Decodes the JSON props column.
 *
 * @throws DatabaseOperationError when the column is not a JSON object
 */
export function parseRecordProps(row: RecordRow): Record<string, unknown> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(row.props);
  } catch (error) {
    throw new DatabaseOperationError(
      `Record ${row.kind}/${row.id} has malformed props`,
      { operation: "read", entity: "record" },
      { cause: error },
    );
  }

  const result = propsSchema.safeParse(decoded);
  if (!result.success) {
    throw new DatabaseOperationError(
      `Record ${row.kind}/${row.id} props are not an object`,
      { operation: "read", entity: "record" },
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * Transforms a record row into a record.
 *
 * Props are spread at top level, timestamps go under `meta`.
 */
export function rowToRecord(row: RecordRow): EntityRecord {
  return {
    ...filterReservedKeys(parseRecordProps(row)),
    id: row.id,
    kind: row.kind,
    meta: {
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    },
  };
}
