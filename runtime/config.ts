import path from "node:path";
import { DEFAULT_BUSY_TIMEOUT_MS, DEFAULT_SQLITE_DB_REL_PATH } from "../src/adapter/storage/sqlite";
import { configurationError } from "../src/core/errors/core.errors";
import { DEFAULT_WRITE_RETRY_POLICY, type RetryPolicy } from "../src/core/store/backoff";
import type { ServeArgs } from "./cli/serve.args";
import { DEFAULT_SESSION_SECRET, SessionSecret } from "./secrets/session_secret";

export interface ServiceConfig {
  readonly dbPath: string;
  readonly host: string;
  readonly port: number;
  readonly sessionSecret: SessionSecret;
  readonly production: boolean;
  readonly writeRetry: RetryPolicy;
  readonly readPoolSize: number;
  readonly busyTimeoutMs: number;
  readonly requestDeadlineMs: number;
  readonly shutdownGraceMs: number;
  readonly paintCooldownMs: number;
}

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 4201;

const DEFAULTS = {
  readPoolSize: 2,
  requestDeadlineMs: 10_000,
  shutdownGraceMs: 5_000,
  paintCooldownMs: 1_000,
} as const;

function readTrimmed(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key];
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed === "" ? undefined : trimmed;
}

function readInteger(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  bounds: { readonly min: number; readonly max: number }
): number {
  const raw = readTrimmed(env, key);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < bounds.min || parsed > bounds.max) {
    throw configurationError(
      `${key} must be an integer between ${String(bounds.min)} and ${String(bounds.max)}`
    );
  }
  return parsed;
}

function resolveSessionSecret(env: NodeJS.ProcessEnv, production: boolean): SessionSecret {
  // Raw env read: surrounding whitespace is part of the credential.
  const raw = env.SESSION_SECRET ?? env.ANKIPLACE_SECRET;
  if (typeof raw === "string" && raw.trim() === "") {
    throw configurationError("SESSION_SECRET must not be blank");
  }
  const secret = new SessionSecret(raw ?? DEFAULT_SESSION_SECRET);
  if (secret.isDefault && production) {
    throw configurationError(
      "SESSION_SECRET is unset or left at its default; set a unique value before running with NODE_ENV=production"
    );
  }
  return secret;
}

export function loadServiceConfig(
  env: NodeJS.ProcessEnv = process.env,
  args: ServeArgs = {}
): ServiceConfig {
  const production = readTrimmed(env, "NODE_ENV") === "production";
  const dbPath = path.resolve(args.dbPath ?? readTrimmed(env, "DB_PATH") ?? DEFAULT_SQLITE_DB_REL_PATH);

  return {
    dbPath,
    host: args.host ?? readTrimmed(env, "HOST") ?? DEFAULT_HOST,
    port: args.port ?? readInteger(env, "PORT", DEFAULT_PORT, { min: 1, max: 65_535 }),
    sessionSecret: resolveSessionSecret(env, production),
    production,
    writeRetry: {
      maxAttempts: readInteger(env, "WRITE_MAX_ATTEMPTS", DEFAULT_WRITE_RETRY_POLICY.maxAttempts, {
        min: 1,
        max: 100,
      }),
      baseDelayMs: readInteger(env, "WRITE_RETRY_BASE_MS", DEFAULT_WRITE_RETRY_POLICY.baseDelayMs, {
        min: 0,
        max: 60_000,
      }),
      maxDelayMs: readInteger(env, "WRITE_RETRY_MAX_MS", DEFAULT_WRITE_RETRY_POLICY.maxDelayMs, {
        min: 0,
        max: 60_000,
      }),
    },
    readPoolSize: readInteger(env, "READ_POOL_SIZE", DEFAULTS.readPoolSize, { min: 1, max: 64 }),
    busyTimeoutMs: readInteger(env, "BUSY_TIMEOUT_MS", DEFAULT_BUSY_TIMEOUT_MS, {
      min: 0,
      max: 60_000,
    }),
    requestDeadlineMs: readInteger(env, "REQUEST_DEADLINE_MS", DEFAULTS.requestDeadlineMs, {
      min: 1,
      max: 600_000,
    }),
    shutdownGraceMs: readInteger(env, "SHUTDOWN_GRACE_MS", DEFAULTS.shutdownGraceMs, {
      min: 0,
      max: 600_000,
    }),
    paintCooldownMs: readInteger(env, "PAINT_COOLDOWN_MS", DEFAULTS.paintCooldownMs, {
      min: 0,
      max: 3_600_000,
    }),
  };
}

export function describeServiceConfig(config: ServiceConfig): string {
  return [
    `dbPath=${config.dbPath}`,
    `host=${config.host}`,
    `port=${String(config.port)}`,
    `secret=${String(config.sessionSecret)}${config.sessionSecret.isDefault ? "(default)" : ""}`,
    `readPoolSize=${String(config.readPoolSize)}`,
    `writeMaxAttempts=${String(config.writeRetry.maxAttempts)}`,
    `requestDeadlineMs=${String(config.requestDeadlineMs)}`,
  ].join(" ");
}
