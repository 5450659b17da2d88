import path from "path";
import { DEFAULT_SCHEDULE_CAP } from "./domain/scheduleEnumerator";

export const PROJECT_ROOT = path.join(__dirname, "..");

export const DEFAULT_CATALOGUE_URL = "https://myhub.njit.edu/scbldr/include/datasvc.php?p=/";

export interface AppConfig {
  port: number;
  catalogueFile: string;
  catalogueUrl: string;
  maxSchedules: number;
  catalogueReloadMinutes: number; // 0 disables periodic reload
  searchTimeoutMs: number; // 0 means no deadline
  corsOrigins: string[];
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

/**
 * Read configuration from the environment (dotenv is loaded by the entry points).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const catalogueFile = env.CATALOGUE_FILE?.trim() || "data/all_sections.json";
  const origins = env.CORS_ORIGINS?.trim();

  return {
    port: readInteger(env, "API_PORT", 3001, 1),
    catalogueFile: path.resolve(PROJECT_ROOT, catalogueFile),
    catalogueUrl: env.CATALOGUE_URL?.trim() || DEFAULT_CATALOGUE_URL,
    maxSchedules: readInteger(env, "MAX_SCHEDULES", DEFAULT_SCHEDULE_CAP, 1),
    catalogueReloadMinutes: readInteger(env, "CATALOGUE_RELOAD_MINUTES", 0, 0),
    searchTimeoutMs: readInteger(env, "SEARCH_TIMEOUT_MS", 0, 0),
    corsOrigins: origins
      ? origins.split(",").map((o) => o.trim()).filter(Boolean)
      : ["http://localhost:5173", "http://localhost:3000"],
  };
}
