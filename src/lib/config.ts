/**
 * Runtime settings, read from the environment on every call so that tests
 * and route handlers see the current values.
 *
 *   DATABASE_URL / POSTGRES_URL   result cache in Neon Postgres (else SQLite)
 *   SOLVER_CACHE_PATH             SQLite file, default data/solver-cache.db
 *   SOLVER_CACHE_DISABLED=1       skip the result cache entirely
 *   SOLVER_MAX_NUMBERS            largest hand the API accepts (5)
 *   SOLVER_MAX_TARGET_SPAN        largest target range / coverage bound (2000)
 *   SOLVER_MAX_COMBINATIONS       largest combination search (5000)
 *   SOLVER_MAX_TREES              trees one combination search may build (10000000)
 */

/** Also the page's hand limit, which runs the solver in the browser. */
export const DEFAULT_MAX_NUMBERS = 5;

export type SolverConfig = {
  databaseUrl: string | null;
  cachePath: string;
  cacheDisabled: boolean;
  maxNumbers: number;
  maxTargetSpan: number;
  maxCombinations: number;
  maxTrees: number;
};

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return n;
}

export function getConfig(): SolverConfig {
  return {
    databaseUrl: process.env.DATABASE_URL || process.env.POSTGRES_URL || null,
    cachePath: process.env.SOLVER_CACHE_PATH || "data/solver-cache.db",
    cacheDisabled: process.env.SOLVER_CACHE_DISABLED === "1",
    maxNumbers: intFromEnv("SOLVER_MAX_NUMBERS", DEFAULT_MAX_NUMBERS),
    maxTargetSpan: intFromEnv("SOLVER_MAX_TARGET_SPAN", 2000),
    maxCombinations: intFromEnv("SOLVER_MAX_COMBINATIONS", 5000),
    maxTrees: intFromEnv("SOLVER_MAX_TREES", 10_000_000),
  };
}
