/* Engine configuration, read once from the environment at construction time.
 * Integer settings fall back to their defaults on missing, non-numeric or non-positive values.
 */
import type { LogLevel } from "./log";

export type EngineConfig = {
  primaryConvexUrl: string;
  sharedConvexUrl: string;
  mockConvex: boolean;
  profilePollIntervalMs: number;
  profilePollAttempts: number;
  notifierBufferSize: number;
  listPageSize: number;
  logLevel: LogLevel;
  backfillStudioId: string;
  backfillStudioName: string;
  backfillDiscountPercent: number;
};

type Env = Record<string, string | undefined>;

const DEFAULT_CONVEX_URL = "http://127.0.0.1:3210";

export function parseIntEnv(env: Env, name: string, def: number): number {
  const v = Number(env[name] || "");
  return Number.isFinite(v) && v > 0 ? Math.floor(v) : def;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  switch ((raw || "").toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
      return "warn";
    case "error":
      return "error";
    default:
      return "info";
  }
}

export function loadConfig(env: Env = process.env): EngineConfig {
  const shared = env.SHARED_CONVEX_URL || env.CONVEX_URL || DEFAULT_CONVEX_URL;
  return {
    primaryConvexUrl: env.PRIMARY_CONVEX_URL || shared,
    sharedConvexUrl: shared,
    mockConvex: env.MOCK_CONVEX === "1",
    profilePollIntervalMs: parseIntEnv(env, "PROFILE_POLL_INTERVAL_MS", 3000),
    profilePollAttempts: parseIntEnv(env, "PROFILE_POLL_ATTEMPTS", 2),
    notifierBufferSize: parseIntEnv(env, "NOTIFIER_BUFFER_SIZE", 256),
    listPageSize: parseIntEnv(env, "LIST_PAGE_SIZE", 50),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    backfillStudioId: env.BACKFILL_STUDIO_ID || "home",
    backfillStudioName: env.BACKFILL_STUDIO_NAME || "Home Studio",
    backfillDiscountPercent: Math.min(100, parseIntEnv(env, "BACKFILL_DISCOUNT_PERCENT", 25)),
  };
}
