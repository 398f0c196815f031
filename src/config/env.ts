import dotenv from "dotenv";
import { loadConfig } from "./summaryConfig.js";

dotenv.config();

export const env = loadConfig(process.env);

export function requireEnv(name: "DATABASE_URL" | "REDIS_URL"): string {
  const v = env[name];
  if (!v) throw new Error(`Missing env var: ${name}`);
  return v;
}
