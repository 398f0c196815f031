import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { applyMigrations, listMigrations } from "../migrations.js";
import type { Queryable, QueryResultLike } from "../../state/PgStateStore.js";

type Call = { text: string; values?: unknown[] };

function fakeDb(appliedNames: string[]): Queryable & { calls: Call[] } {
  const calls: Call[] = [];
  return {
    calls,
    query: async (text, values): Promise<QueryResultLike> => {
      calls.push({ text, values });
      if (text.startsWith("SELECT name")) {
        return { rows: appliedNames.map((name) => ({ name })), rowCount: appliedNames.length };
      }
      return { rows: [], rowCount: 0 };
    }
  };
}

describe("applyMigrations", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "summary-migrations-"));
    fs.writeFileSync(path.join(dir, "002_second.sql"), "SELECT 2;");
    fs.writeFileSync(path.join(dir, "001_first.sql"), "SELECT 1;");
    fs.writeFileSync(path.join(dir, "notes.txt"), "not sql");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("lists only sql files in name order", () => {
    assert.deepEqual(listMigrations(dir), ["001_first.sql", "002_second.sql"]);
  });

  it("applies pending files in order and records each one", async () => {
    const db = fakeDb([]);
    assert.deepEqual(await applyMigrations(db, dir), ["001_first.sql", "002_second.sql"]);

    const rest = db.calls.slice(2);
    assert.deepEqual(rest, [
      { text: "SELECT 1;", values: undefined },
      { text: "INSERT INTO schema_migrations(name) VALUES ($1)", values: ["001_first.sql"] },
      { text: "SELECT 2;", values: undefined },
      { text: "INSERT INTO schema_migrations(name) VALUES ($1)", values: ["002_second.sql"] }
    ]);
  });

  it("skips files already in the ledger", async () => {
    const db = fakeDb(["001_first.sql"]);
    assert.deepEqual(await applyMigrations(db, dir), ["002_second.sql"]);
    assert.equal(db.calls.some((c) => c.text === "SELECT 1;"), false);
  });

  it("applies the shipped migration", async () => {
    const db = fakeDb([]);
    assert.deepEqual(await applyMigrations(db, path.resolve("migrations")), ["001_summary_state.sql"]);
    assert.match(db.calls[2].text, /CREATE TABLE IF NOT EXISTS summary_sync_state/);
  });
});
