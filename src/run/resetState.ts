import { env } from "../config/env.js";
import { stateKey } from "../sync/writeGate.js";
import { createStateStore } from "./deps.js";

async function main() {
  const arg = process.argv[2];
  if (!arg) throw new Error("Usage: npm run reset -- --all | <report name>");

  const state = await createStateStore(env);

  if (arg === "--all") {
    // Full reset: every report is rewritten on the next cycle and the cursor restarts at 0.
    const n = await state.resetSyncState();
    console.log(`✓ Cleared ALL summary state (${n} entries removed)`);
  } else {
    const n = await state.resetSyncState(stateKey(arg));
    console.log(`✓ Cleared state for "${arg}" (${n} entries removed)`);
  }

  if (env.STATE_BACKEND === "postgres") {
    const { pool } = await import("../db/pool.js");
    await pool.end();
  }
}

main().catch(e => { console.error(e); process.exit(1); });
