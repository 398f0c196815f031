import path from "path";
import { applyMigrations } from "./migrations.js";
import { pool } from "./pool.js";

async function main() {
  const dir = path.resolve("migrations");
  const applied = await applyMigrations({ query: (text, values) => pool.query(text, values) }, dir);
  if (applied.length === 0) console.log("Schema up to date:", dir);
  for (const name of applied) console.log("Migration applied:", name);
  await pool.end();
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
