// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { beforeEach, describe, expect, it } from "vitest";
import { hashKey } from "../../../common/crypto.js";
import { withTelemetry } from "../../../common/telemetry.js";
import type { LockEvent } from "../../../common/types.js";
import { createMemoryClient } from "../../../memory/client.js";
import { type MemoryStore, createMemoryStore } from "../../../memory/store.js";

describe("withTelemetry", () => {
  let store: MemoryStore;
  let events: LockEvent[];

  beforeEach(() => {
    store = createMemoryStore();
    events = [];
  });

  const instrumented = async (
    clientId: string,
    includeRaw?: boolean | ((event: LockEvent) => boolean),
  ) =>
    withTelemetry(await createMemoryClient({ store, clientId }), {
      onEvent: (event) => events.push(event),
      includeRaw,
    });

  it("should emit redacted events for successful operations", async () => {
    const client = await instrumented("a1");
    const lock = client.newLock("job-7");

    await lock.acquire(5000);
    await lock.info();
    await lock.refresh();
    await lock.release();

    expect(events.map((event) => event.type)).toEqual([
      "acquire",
      "info",
      "refresh",
      "release",
    ]);
    expect(events[0]).toEqual({
      type: "acquire",
      nameHash: hashKey("job-7"),
      clientIdHash: hashKey("a1"),
      result: "ok",
    });
  });

  it("should report the error code of a failed operation and rethrow", async () => {
    await (await instrumented("a1")).newLock("job-7").acquire(5000);
    const rival = await instrumented("b2");

    await expect(rival.newLock("job-7").acquire(5000)).rejects.toMatchObject({
      code: "LockHeldByOtherClient",
    });

    expect(events[1]).toMatchObject({
      type: "acquire",
      result: "fail",
      reason: "LockHeldByOtherClient",
      clientIdHash: hashKey("b2"),
    });
  });

  it("should report refreshTTL as a refresh", async () => {
    const lock = (await instrumented("a1")).newLock("job-7");
    await lock.acquire(1000);

    await lock.refreshTTL(2000);

    expect(events[1]).toMatchObject({ type: "refresh", result: "ok" });
    expect(lock.ttlMs).toBe(2000);
  });

  it("should include raw identifiers when allowed", async () => {
    const lock = (await instrumented("a1", true)).newLock("job-7");

    await lock.info();

    expect(events[0]).toMatchObject({ name: "job-7", clientId: "a1" });
  });

  it("should include raw identifiers only where the predicate allows", async () => {
    const client = await instrumented("a1", (event) => event.result === "fail");
    const lock = client.newLock("job-7");

    await lock.acquire(1000);
    await lock.acquire(1000).catch(() => undefined);

    expect(events[0]?.name).toBeUndefined();
    expect(events[1]).toMatchObject({ name: "job-7", clientId: "a1" });
  });

  it("should redact when the predicate throws", async () => {
    const client = await instrumented("a1", () => {
      throw new Error("predicate failed");
    });

    await client.newLock("job-7").info();

    expect(events[0]?.name).toBeUndefined();
    expect(events[0]?.clientId).toBeUndefined();
  });

  it("should not let a throwing callback affect lock operations", async () => {
    const client = withTelemetry(
      await createMemoryClient({ store, clientId: "a1" }),
      {
        onEvent: () => {
          throw new Error("sink unavailable");
        },
      },
    );

    await client.newLock("job-7").acquire(1000);

    expect((await client.newLock("job-7").info()).owner).toBe("a1");
  });

  it("should instrument clones and pass through client state", async () => {
    const client = await instrumented("a1");
    const copy = client.clone();
    await copy.reconnect();

    await copy.newLock("job-7").info();

    expect(events).toHaveLength(1);
    expect(copy.id()).toBe("a1");
    expect(copy.connected).toBe(true);
    expect(client.capabilities.backend).toBe("memory");
    expect(client.namespace).toBe("glock");
  });

  it("should hash the identity in effect at call time", async () => {
    const client = await instrumented("a1");
    const lock = client.newLock("job-7");

    client.setId("a2");
    await lock.info();

    expect(events[0]?.clientIdHash).toBe(hashKey("a2"));
  });

  it("should pass setData through without an event", async () => {
    const lock = (await instrumented("a1")).newLock("job-7");

    lock.setData("payload");

    expect(lock.data).toBe("payload");
    expect(events).toEqual([]);
  });
});
