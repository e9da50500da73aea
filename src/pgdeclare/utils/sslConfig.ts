// utils/sslConfig.ts

import type { ConnectionOptions } from "node:tls";

export interface SSLConfigOptions {
  nodeEnv?: string;
  allowSSL?: boolean | undefined;
  rejectUnauthorized?: boolean | undefined;
  databaseUrl?: string;
}

/**
 * Resolves the `ssl` option handed to `pg.Pool`:
 * explicit allowSSL, then sslmode/ssl flags in the URL, then on in production.
 */
export function getSSLConfig(opts: SSLConfigOptions = {}): false | ConnectionOptions {
  const { nodeEnv = "development", allowSSL, rejectUnauthorized, databaseUrl } = opts;

  if (typeof allowSSL === "boolean") {
    return allowSSL ? { rejectUnauthorized: rejectUnauthorized ?? false } : false;
  }

  const lower = (databaseUrl ?? "").toLowerCase();
  if (lower.includes("sslmode=require") || lower.includes("ssl=true")) {
    return { rejectUnauthorized: rejectUnauthorized ?? false };
  }

  if (nodeEnv === "production") {
    return { rejectUnauthorized: rejectUnauthorized ?? true };
  }

  return false;
}
