// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Example usage patterns for leaselock with the Redis backend.
 * Demonstrates single-shot acquisition, caller-side retry, lease renewal
 * for long jobs, and inspection.
 */

import { LockError, delay, isLockError } from "../index.js";
import { createRedisClient } from "../redis/index.js";

// Example 1: Single attempt, give up on contention
async function runNightlyReport(): Promise<void> {
  const client = await createRedisClient({
    address: "localhost:6379",
    namespace: "myapp",
    // For hosted Redis add: redisOptions: { password, tls: {} }
  });

  try {
    const lock = client.newLock("nightly-report");
    lock.setData(JSON.stringify({ host: "worker-1", startedAt: Date.now() }));

    try {
      await lock.acquire(60_000);
    } catch (error) {
      if (isLockError(error, "LockHeldByOtherClient")) {
        console.log("Report already running elsewhere");
        return;
      }
      throw error;
    }

    try {
      console.log("Generating report...");
      await delay(2_000);
    } finally {
      await lock.release();
    }
  } finally {
    await client.close();
  }
}

// Example 2: Retry with backoff (retry policy belongs to the caller)
async function acquireWithRetry(
  lock: { acquire(ttlMs: number): Promise<void> },
  ttlMs: number,
  attempts: number,
): Promise<boolean> {
  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      await lock.acquire(ttlMs);
      return true;
    } catch (error) {
      if (!isLockError(error, "LockHeldByOtherClient")) {
        throw error;
      }
      await delay(100 * 2 ** attempt);
    }
  }
  return false;
}

// Example 3: Long job with lease renewal every ttl/3
async function processBatch(batchId: string): Promise<void> {
  const client = await createRedisClient({ namespace: "myapp" });
  const lock = client.newLock(`batch:${batchId}`);

  try {
    if (!(await acquireWithRetry(lock, 15_000, 5))) {
      console.log(`Batch ${batchId} is busy`);
      return;
    }

    const lease: { lost?: LockError } = {};
    const heartbeat = setInterval(() => {
      lock.setData(`progress=${Date.now()}`);
      lock.refresh().catch((error: unknown) => {
        lease.lost = isLockError(error)
          ? error
          : new LockError("StoreError", "Refresh failed", { cause: error });
        clearInterval(heartbeat);
      });
    }, 5_000);

    try {
      for (let step = 0; step < 10 && !lease.lost; step++) {
        await delay(1_000);
      }
    } finally {
      clearInterval(heartbeat);
    }

    if (lease.lost) {
      console.error(`Lease lost mid-batch: ${lease.lost.code}`);
      return;
    }

    const info = await lock.info();
    console.log(
      `Holding ${info.name}, ${info.ttlMs}ms left, data=${info.data}`,
    );
    await lock.release();
  } finally {
    await client.close();
  }
}

// Example 4: Independent session under the same identity
async function inspectFromSecondSession(): Promise<void> {
  const client = await createRedisClient({ clientId: "worker-1" });
  const session = client.clone();

  try {
    await session.reconnect();
    const info = await session.newLock("nightly-report").info();
    console.log(
      info.acquired
        ? `Held by ${info.owner === client.id() ? "us" : info.owner}`
        : "Free",
    );
  } finally {
    await session.close();
    await client.close();
  }
}

async function main(): Promise<void> {
  await runNightlyReport();
  await processBatch("2024-01");
  await inspectFromSecondSession();
}

main().catch((error: unknown) => {
  console.error("Example failed:", error);
  process.exitCode = 1;
});
