import { z } from "zod";
import { ConfigError } from "./errors";
import { logger } from "./logger";

export interface RedditCredentials {
  clientId: string;
  clientSecret: string;
  userAgent: string;
  username?: string;
  password?: string;
}

export interface AppConfig {
  reddit: RedditCredentials;
  requestDelayMs: number; // Sleep between API calls
  maxRateLimitRetries: number; // Attempts per call when throttled
  retryBaseDelayMs: number; // First backoff delay, doubled each attempt
}

export const DEFAULT_OUTPUT_DIR = "./personas";
export const DEFAULT_MAX_POSTS = 100;
export const DEFAULT_MAX_COMMENTS = 200;

const DEFAULTS = {
  requestDelayMs: 100,
  maxRateLimitRetries: 3,
  retryBaseDelayMs: 2000,
};

const REQUIRED_VARS = [
  "REDDIT_CLIENT_ID",
  "REDDIT_CLIENT_SECRET",
  "REDDIT_USER_AGENT",
] as const;

type Env = Record<string, string | undefined>;

function readInt(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  max: number
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const parsed = z.coerce.number().int().min(min).max(max).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`${name} must be an integer between ${min} and ${max}`);
  }
  return parsed.data;
}

/**
 * Builds the application config from environment variables. All missing
 * credentials are reported together.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const missing = REQUIRED_VARS.filter((name) => !env[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(", ")}`,
      [...missing]
    );
  }

  const username = env.REDDIT_USERNAME?.trim() || undefined;
  const password = env.REDDIT_PASSWORD || undefined;
  if (Boolean(username) !== Boolean(password)) {
    logger.warn(
      "⚠️ REDDIT_USERNAME and REDDIT_PASSWORD must be set together, using app-only access"
    );
  }
  const withAccount = Boolean(username && password);

  return {
    reddit: {
      clientId: env.REDDIT_CLIENT_ID?.trim() ?? "",
      clientSecret: env.REDDIT_CLIENT_SECRET?.trim() ?? "",
      userAgent: env.REDDIT_USER_AGENT?.trim() ?? "",
      username: withAccount ? username : undefined,
      password: withAccount ? password : undefined,
    },
    requestDelayMs: readInt(
      env,
      "REDDIT_REQUEST_DELAY_MS",
      DEFAULTS.requestDelayMs,
      0,
      10000
    ),
    maxRateLimitRetries: readInt(
      env,
      "REDDIT_MAX_RETRIES",
      DEFAULTS.maxRateLimitRetries,
      1,
      10
    ),
    retryBaseDelayMs: DEFAULTS.retryBaseDelayMs,
  };
}

export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    reddit: {
      ...config.reddit,
      clientSecret: "***",
      password: config.reddit.password ? "***" : undefined,
    },
  };
}
