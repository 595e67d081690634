/**
 * Shared helpers for examples
 *
 * Provides an easy way to create an in-memory SQLite database
 * for running examples.
 */
import { createLocalSqliteBackend } from "cascade-purge/sqlite/local";

/**
 * Creates an in-memory SQLite backend for examples.
 */
export function createExampleBackend() {
  const { backend } = createLocalSqliteBackend();
  return backend;
}
