// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Example usage of the PostgreSQL backend: one-time schema setup, then the
 * same lock API as every other backend.
 */

import postgres from "postgres";
import { isLockError } from "../index.js";
import { createPostgresClient, setupSchema } from "../postgres/index.js";

const url = process.env.DATABASE_URL ?? "postgresql://localhost:5432/myapp";

async function main(): Promise<void> {
  const sql = postgres(url);
  await setupSchema(sql);

  // Share the application's pool; the client leaves it open
  const client = await createPostgresClient({ sql, namespace: "billing" });

  const lock = client.newLock("invoice-run:2024-06");
  lock.setData("worker-1");

  try {
    await lock.acquire(30_000);
  } catch (error) {
    if (isLockError(error, "LockHeldByOtherClient")) {
      const info = await lock.info();
      console.log(`Invoice run held by ${info.owner} (${info.data})`);
      await client.close();
      await sql.end();
      return;
    }
    throw error;
  }

  try {
    console.log("Running invoices...");
    await lock.refreshTTL(60_000);
  } finally {
    await lock.release();
    await client.close();
    await sql.end();
  }
}

main().catch((error: unknown) => {
  console.error("Example failed:", error);
  process.exitCode = 1;
});
