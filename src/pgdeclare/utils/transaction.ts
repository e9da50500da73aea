// utils/transaction.ts

import type { Connection, QueryExecutor } from "../model-types.js";
import { logSection } from "./logger.js";

/**
 * BEGIN, `setup`, `fn`, COMMIT on a single client; ROLLBACK and rethrow on
 * failure. A client checked out here is released here.
 */
export async function inTransaction<T>(
  connection: Connection,
  fn: (client: QueryExecutor) => Promise<T>,
  setup: readonly string[] = []
): Promise<T> {
  const owned = !("release" in connection);
  const client = "release" in connection ? connection : await connection.connect();

  try {
    await client.query("BEGIN");
    for (const stmt of setup) await client.query(stmt);

    const result = await fn(client);

    await client.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      logSection("error", "TRANSACTION", [
        { tone: "error", action: "Rollback failed", subject: String(rollbackErr) },
      ]);
    }
    throw err;
  } finally {
    if (owned) client.release();
  }
}
