import fs from "fs";
import path from "path";
import type { Queryable } from "../state/PgStateStore.js";

const LEDGER = "schema_migrations";

export function listMigrations(dir: string): string[] {
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith(".sql"))
    .sort();
}

/**
 * Applies every `.sql` file in `dir` not yet recorded in the ledger table,
 * in file-name order. Returns the names applied by this call.
 */
export async function applyMigrations(db: Queryable, dir: string): Promise<string[]> {
  await db.query(
    `CREATE TABLE IF NOT EXISTS ${LEDGER} (
       name       text PRIMARY KEY,
       applied_at timestamptz NOT NULL DEFAULT now()
     )`
  );

  const res = await db.query(`SELECT name FROM ${LEDGER}`);
  const done = new Set<string>();
  for (const row of res.rows) {
    if (typeof row === "object" && row !== null && "name" in row && typeof row.name === "string") done.add(row.name);
  }

  const applied: string[] = [];
  for (const name of listMigrations(dir)) {
    if (done.has(name)) continue;
    await db.query(fs.readFileSync(path.join(dir, name), "utf8"));
    await db.query(`INSERT INTO ${LEDGER}(name) VALUES ($1)`, [name]);
    applied.push(name);
  }
  return applied;
}
