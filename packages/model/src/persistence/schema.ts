/**
 * SQL schema for snapshot persistence.
 * The table name is configurable, so the statement is built per store.
 */

export const DEFAULT_SNAPSHOT_TABLE = "model_snapshots";

export function createSnapshotTable(table: string): string {
  return `
  CREATE TABLE IF NOT EXISTS ${table} (
    schema_name TEXT PRIMARY KEY,
    snapshot TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  )
`;
}
