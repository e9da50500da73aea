// utils/config.ts

import dotenv from "dotenv";

import { ConfigurationError } from "../errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export interface PgDeclareConfig {
  databaseUrl: string | undefined;
  nodeEnv: string;
  allowSSL: boolean | undefined;
  rejectUnauthorized: boolean | undefined;
  logLevel: LogLevel;
  schemaOwner: string | undefined;
}

type Env = Record<string, string | undefined>;

function parseBoolean(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return undefined;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new ConfigurationError(`${key} must be true or false, got "${env[key]}"`, {
    key,
  });
}

function parseLogLevel(env: Env): LogLevel {
  const raw = env.PGDECLARE_LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return "info";
  const level = LOG_LEVELS.find((l) => l === raw);
  if (!level) {
    throw new ConfigurationError(
      `PGDECLARE_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${raw}"`,
      { key: "PGDECLARE_LOG_LEVEL" }
    );
  }
  return level;
}

/** Reads configuration from `env`; every option is resolved here, once. */
export function readConfig(env: Env): PgDeclareConfig {
  return {
    databaseUrl: env.DATABASE_URL || undefined,
    nodeEnv: env.NODE_ENV || "development",
    allowSSL: parseBoolean(env, "PGDECLARE_ALLOW_SSL"),
    rejectUnauthorized: parseBoolean(env, "PGDECLARE_REJECT_UNAUTHORIZED"),
    logLevel: parseLogLevel(env),
    schemaOwner: env.PGDECLARE_SCHEMA_OWNER || undefined,
  };
}

/** Loads `.env` into `process.env`, then reads it. */
export function loadConfig(): PgDeclareConfig {
  dotenv.config();
  return readConfig(process.env);
}
