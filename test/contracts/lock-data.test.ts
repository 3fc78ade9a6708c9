// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { beforeEach, describe, expect, it } from "vitest";
import type { LockClient } from "../../common/types.js";
import { type BackendFixtureResult, backends } from "../fixtures/backends.js";

describe("Lock Data", () => {
  for (const fixture of backends) {
    describe(`${fixture.name}`, () => {
      let env: BackendFixtureResult;
      let client: LockClient;

      beforeEach(async () => {
        env = fixture.setup();
        client = await env.createClient("a1");
      });

      it("should store data set before acquire", async () => {
        const lock = client.newLock("report");
        lock.setData("host=worker-3");

        await lock.acquire(5000);

        expect((await lock.info()).data).toBe("host=worker-3");
      });

      it("should not write data set after acquire until the next refresh", async () => {
        const lock = client.newLock("report");
        await lock.acquire(5000);

        lock.setData("progress=50%");
        expect(lock.data).toBe("progress=50%");
        expect((await lock.info()).data).toBe("");

        await lock.refresh();
        expect((await lock.info()).data).toBe("progress=50%");
      });

      it("should overwrite stored data with the handle's data on refresh", async () => {
        const lock = client.newLock("report");
        lock.setData("first");
        await lock.acquire(5000);

        lock.setData("");
        await lock.refresh();

        expect((await lock.info()).data).toBe("");
      });

      it("should let any client read another holder's data", async () => {
        const lock = client.newLock("shared-report");
        lock.setData(JSON.stringify({ step: 2 }));
        await lock.acquire(5000);

        const observer = await env.createClient("observer");
        const info = await observer.newLock("shared-report").info();

        expect(info.owner).toBe("a1");
        expect(JSON.parse(info.data)).toEqual({ step: 2 });
      });

      it("should keep data readable after the lease expires", async () => {
        const lock = client.newLock("left-behind");
        lock.setData("last-words");
        await lock.acquire(1000);

        env.clock.advance(2000);

        expect(await lock.info()).toEqual({
          name: "left-behind",
          acquired: false,
          owner: "",
          ttlMs: 0,
          data: "last-words",
        });
      });

      it("should replace stale data when a new owner acquires", async () => {
        const first = client.newLock("rotating");
        first.setData("old");
        await first.acquire(1000);
        env.clock.advance(1000);

        const second = (await env.createClient("b2")).newLock("rotating");
        await second.acquire(1000);

        expect((await second.info()).data).toBe("");
      });

      it("should round-trip unicode payloads", async () => {
        const lock = client.newLock("unicode");
        lock.setData("grüße ✓ 日本");
        await lock.acquire(5000);

        expect((await lock.info()).data).toBe("grüße ✓ 日本");
      });
    });
  }
});
