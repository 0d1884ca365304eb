import type Database from "better-sqlite3";
import { MetaModel } from "../model.js";
import { DEFAULT_SNAPSHOT_TABLE, createSnapshotTable } from "./schema.js";

export type SnapshotStoreOptions = {
  /** Table to keep snapshots in. Defaults to "model_snapshots". */
  table?: string;
};

export type SnapshotStore = {
  save(model: MetaModel): void;
  load(schema: string): MetaModel | null;
  list(): string[];
  delete(schema: string): boolean;
};

type Row = {
  snapshot: string;
};

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Compiled models keyed by schema name. What is stored is exactly the
 * model's serialized snapshot, so a loaded model is frozen and sealed.
 */
export function createSnapshotStore(
  db: Database.Database,
  options: SnapshotStoreOptions = {},
): SnapshotStore {
  const table = options.table ?? DEFAULT_SNAPSHOT_TABLE;
  if (!TABLE_NAME.test(table)) {
    throw new Error(`Invalid snapshot table name "${table}"`);
  }
  db.exec(createSnapshotTable(table));

  const upsert = db.prepare<[string, string, number, number]>(
    `INSERT INTO ${table} (schema_name, snapshot, created_at, updated_at)
     VALUES (?, ?, ?, ?)
     ON CONFLICT(schema_name) DO UPDATE SET
       snapshot = excluded.snapshot,
       updated_at = excluded.updated_at`,
  );
  const select = db.prepare<[string], Row>(
    `SELECT snapshot FROM ${table} WHERE schema_name = ?`,
  );
  const selectAll = db.prepare<[], { schema_name: string }>(
    `SELECT schema_name FROM ${table} ORDER BY schema_name`,
  );
  const remove = db.prepare<[string]>(`DELETE FROM ${table} WHERE schema_name = ?`);

  return {
    save(model) {
      const now = Date.now();
      upsert.run(
        model.schema,
        new TextDecoder().decode(model.toBytes()),
        now,
        now,
      );
    },

    load(schema) {
      const row = select.get(schema);
      if (!row) return null;
      return MetaModel.fromBytes(new TextEncoder().encode(row.snapshot));
    },

    list() {
      return selectAll.all().map((r) => r.schema_name);
    },

    delete(schema) {
      return remove.run(schema).changes > 0;
    },
  };
}
