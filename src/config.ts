// Interview Coach Engine - Process configuration
// Read once at startup from the environment (populated from .env by dotenv).
// Coaching policy values (smoothing, override margin, history size) live in
// the rules document instead, so they reload with the rules.

import { DEFAULT_FILLER_WORDS } from "./signal-features.js";
import type { Logger } from "./logger.js";

export interface AppConfig {
  port: number;
  rulesPath: string;
  /** Sessions with no tick for this long are dropped. */
  sessionIdleTimeoutMs: number;
  /** How often idle sessions are swept. */
  sessionSweepIntervalMs: number;
  fillerWords: readonly string[];
}

export const DEFAULT_APP_CONFIG: Readonly<AppConfig> = Object.freeze({
  port: 3000,
  rulesPath: "config/coaching-rules.json",
  sessionIdleTimeoutMs: 15 * 60 * 1000,
  sessionSweepIntervalMs: 60 * 1000,
  fillerWords: DEFAULT_FILLER_WORDS,
});

function readPositiveInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  logger: Logger | undefined,
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    logger?.warn(`${key}="${raw}" is not a positive integer; using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Build the process config from environment variables. Unusable values fall
 * back to their defaults with a warning rather than stopping the process.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): AppConfig {
  const fillerWords = (env.FILLER_WORDS ?? "")
    .split(",")
    .map((w) => w.trim().toLowerCase())
    .filter((w) => w.length > 0);

  const rulesPath = env.COACHING_RULES_PATH?.trim();

  return {
    port: readPositiveInt(env, "PORT", DEFAULT_APP_CONFIG.port, logger),
    rulesPath: rulesPath ? rulesPath : DEFAULT_APP_CONFIG.rulesPath,
    sessionIdleTimeoutMs: readPositiveInt(
      env,
      "SESSION_IDLE_TIMEOUT_MS",
      DEFAULT_APP_CONFIG.sessionIdleTimeoutMs,
      logger,
    ),
    sessionSweepIntervalMs: readPositiveInt(
      env,
      "SESSION_SWEEP_INTERVAL_MS",
      DEFAULT_APP_CONFIG.sessionSweepIntervalMs,
      logger,
    ),
    fillerWords: fillerWords.length > 0 ? fillerWords : DEFAULT_APP_CONFIG.fillerWords,
  };
}
