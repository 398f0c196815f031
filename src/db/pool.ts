import pg from "pg";
import { requireEnv } from "../config/env.js";

function normalizeDbUrl(url: string): string {
  try {
    const u = new URL(url);
    // On some Windows setups, `localhost` may resolve in a way that causes ECONNRESET with pg.
    // Force IPv4 loopback for local dev.
    if (u.hostname === "localhost") u.hostname = "127.0.0.1";
    return u.toString();
  } catch {
    return url;
  }
}

export const pool = new pg.Pool({
  connectionString: normalizeDbUrl(requireEnv("DATABASE_URL")),
  max: 2,
  idleTimeoutMillis: 30000
});
