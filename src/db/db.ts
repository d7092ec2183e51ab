import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import initSqlJs, { Database, SqlJsStatic } from "sql.js";

let SQL: SqlJsStatic | null = null;

/**
 * Opens the archive database. With a path that exists on disk the saved image
 * is loaded; otherwise a fresh in-memory database is created. The schema is
 * applied either way.
 */
export async function createDb(path: string | null = null): Promise<Database> {
  if (!SQL) {
    SQL = await initSqlJs();
  }

  const db = path && existsSync(path) ? new SQL.Database(readFileSync(path)) : new SQL.Database();
  const schema = readFileSync(join(process.cwd(), "src/db/schema.sql"), "utf8");
  db.run(schema);
  return db;
}

export function saveDb(db: Database, path: string): void {
  writeFileSync(path, Buffer.from(db.export()));
}
