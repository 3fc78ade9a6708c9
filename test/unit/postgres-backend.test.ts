// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Unit tests for the PostgreSQL backend against a fake `sql` tag:
 * statement shape, parameters, row interpretation and error mapping.
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { createPostgresBackend } from "../../postgres/backend.js";
import { createPostgresClient } from "../../postgres/client.js";
import { createPostgresConfig } from "../../postgres/config.js";
import { setupSchema } from "../../postgres/schema.js";
import { type RecordedQuery, createFakeSql } from "../fixtures/fake-sql.js";

const TABLE = { identifier: "leaselock_locks" };
const config = { namespace: "test", tableName: "leaselock_locks" };

function pgError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

function backendWith(respond: (query: RecordedQuery) => unknown[] | Error) {
  const fake = createFakeSql(respond);
  return { fake, backend: createPostgresBackend(fake.asSql, config) };
}

describe("PostgreSQL Backend", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("acquire", () => {
    it("should upsert only over an expired row", async () => {
      const { fake, backend } = backendWith(() => [{ key: "test:job-7" }]);

      const result = await backend.acquire({
        name: "job-7",
        ownerId: "a1",
        ttlMs: 5000,
        data: "payload",
      });

      expect(result).toEqual({ ok: true });
      const [query] = fake.queries;
      expect(query?.text).toMatch(/^INSERT INTO \$1 \(key, owner, expires_at_ms, data\)/);
      expect(query?.text).toContain("ON CONFLICT (key) DO UPDATE SET");
      expect(query?.text).toContain(
        "WHERE $6.expires_at_ms <= (EXTRACT(EPOCH FROM clock_timestamp()) * 1000)::bigint",
      );
      expect(query?.values).toEqual([
        TABLE,
        "test:job-7",
        "a1",
        5000,
        "payload",
        TABLE,
      ]);
    });

    it("should report contention when no row comes back", async () => {
      const { backend } = backendWith(() => []);

      const result = await backend.acquire({
        name: "job-7",
        ownerId: "b2",
        ttlMs: 5000,
        data: "",
      });

      expect(result).toEqual({ ok: false, reason: "locked" });
    });
  });

  describe("release", () => {
    it("should delete only a live row owned by the caller", async () => {
      const { fake, backend } = backendWith(() => [{ key: "test:job-7" }]);

      const result = await backend.release({ name: "job-7", ownerId: "a1" });

      expect(result).toEqual({ ok: true });
      expect(fake.queries[0]?.text).toBe(
        "DELETE FROM $1 WHERE key = $2 AND owner = $3 AND expires_at_ms > (EXTRACT(EPOCH FROM clock_timestamp()) * 1000)::bigint RETURNING key",
      );
      expect(fake.queries[0]?.values).toEqual([TABLE, "test:job-7", "a1"]);
    });

    it("should report not owned when nothing was deleted", async () => {
      const { backend } = backendWith(() => []);

      expect(await backend.release({ name: "job-7", ownerId: "b2" })).toEqual({
        ok: false,
      });
    });
  });

  describe("refresh", () => {
    it("should replace expiry and data of a live owned row", async () => {
      const { fake, backend } = backendWith(() => [{ key: "test:job-7" }]);

      const result = await backend.refresh({
        name: "job-7",
        ownerId: "a1",
        ttlMs: 8000,
        data: "progress=50%",
      });

      expect(result).toEqual({ ok: true });
      expect(fake.queries[0]?.text).toMatch(/^UPDATE \$1 SET expires_at_ms = /);
      expect(fake.queries[0]?.values).toEqual([
        TABLE,
        8000,
        "progress=50%",
        "test:job-7",
        "a1",
      ]);
    });

    it("should report not owned when nothing was updated", async () => {
      const { backend } = backendWith(() => []);

      const result = await backend.refresh({
        name: "job-7",
        ownerId: "b2",
        ttlMs: 8000,
        data: "",
      });

      expect(result).toEqual({ ok: false });
    });
  });

  describe("inspect", () => {
    it("should convert the BIGINT ttl of a live row", async () => {
      const { fake, backend } = backendWith(() => [
        { owner: "a1", data: "payload", ttl_ms: "2500" },
      ]);

      const snapshot = await backend.inspect({ name: "job-7" });

      expect(snapshot).toEqual({ owner: "a1", ttlMs: 2500, data: "payload" });
      expect(fake.queries[0]?.values).toEqual([TABLE, "test:job-7"]);
    });

    it("should hide the owner of an expired row but keep its data", async () => {
      const { backend } = backendWith(() => [
        { owner: "a1", data: "last-words", ttl_ms: "-40" },
      ]);

      expect(await backend.inspect({ name: "job-7" })).toEqual({
        owner: "",
        ttlMs: 0,
        data: "last-words",
      });
    });

    it("should report an absent lock when no row exists", async () => {
      const { backend } = backendWith(() => []);

      expect(await backend.inspect({ name: "job-7" })).toEqual({
        owner: "",
        ttlMs: 0,
        data: "",
      });
    });
  });

  describe("error mapping", () => {
    it("should map connection-class SQLSTATEs to ConnectionError", async () => {
      const { backend } = backendWith(() =>
        pgError("57P01", "terminating connection due to administrator command"),
      );

      await expect(
        backend.release({ name: "job-7", ownerId: "a1" }),
      ).rejects.toMatchObject({
        code: "ConnectionError",
        message:
          "PostgreSQL connection error: terminating connection due to administrator command",
      });
    });

    it("should map other failures to StoreError with the SQLSTATE", async () => {
      const { backend } = backendWith(() =>
        pgError("42P01", 'relation "leaselock_locks" does not exist'),
      );

      await expect(backend.inspect({ name: "job-7" })).rejects.toMatchObject({
        code: "StoreError",
        message:
          'PostgreSQL error 42P01: relation "leaselock_locks" does not exist',
      });
    });
  });
});

describe("PostgreSQL Client", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should check the connection with SELECT 1", async () => {
    const fake = createFakeSql(() => [{ "?column?": 1 }]);

    const client = await createPostgresClient({
      clientId: "a1",
      connect: fake.asSql,
    });

    expect(fake.queries).toEqual([{ text: "SELECT 1", values: [] }]);
    expect(client.connected).toBe(true);
    expect(client.capabilities).toEqual({
      backend: "postgres",
      timeAuthority: "server",
    });
  });

  it("should pass url and options to the connect function", async () => {
    const fake = createFakeSql();
    const connect = vi.fn(fake.asSql);

    await createPostgresClient({
      url: "postgresql://localhost:5432/app",
      postgresOptions: { max: 4 },
      connect,
    });

    expect(connect).toHaveBeenCalledWith("postgresql://localhost:5432/app", {
      max: 4,
    });
  });

  it("should end an owned pool when SELECT 1 fails", async () => {
    const fake = createFakeSql(() =>
      pgError("28P01", 'password authentication failed for user "app"'),
    );

    await expect(
      createPostgresClient({ connect: fake.asSql }),
    ).rejects.toMatchObject({
      code: "ConnectionError",
      message:
        'PostgreSQL connection error: password authentication failed for user "app"',
    });
    expect(fake.end).toHaveBeenCalledWith({ timeout: 0 });
  });

  it("should end the pool once on repeated close", async () => {
    const fake = createFakeSql();
    const client = await createPostgresClient({ connect: fake.asSql });

    await client.close();
    await client.close();

    expect(fake.end).toHaveBeenCalledTimes(1);
    expect(client.connected).toBe(false);
  });

  it("should log and swallow errors while closing", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const fake = createFakeSql();
    fake.end.mockRejectedValueOnce(new Error("socket hang up"));
    const client = await createPostgresClient({ connect: fake.asSql });

    await expect(client.close()).resolves.toBeUndefined();

    expect(warn).toHaveBeenCalledWith(
      "[leaselock] Failed to close PostgreSQL connection",
      expect.objectContaining({ error: "socket hang up" }),
    );
  });

  it("should keep a shared pool open across reconnect and close", async () => {
    const fake = createFakeSql();
    const sql = fake.asSql();
    const client = await createPostgresClient({ clientId: "a1", sql });

    await client.reconnect();
    await client.close();

    expect(fake.end).not.toHaveBeenCalled();
    await expect(sql`SELECT 1`).resolves.toEqual([]);
  });

  it("should leave a shared pool to the caller when SELECT 1 fails", async () => {
    const fake = createFakeSql(() =>
      pgError("57P03", "the database system is starting up"),
    );

    await expect(
      createPostgresClient({ sql: fake.asSql() }),
    ).rejects.toMatchObject({ code: "ConnectionError" });
    expect(fake.end).not.toHaveBeenCalled();
  });

  it("should keep the source client usable after a clone closes", async () => {
    const fake = createFakeSql();
    const client = await createPostgresClient({
      clientId: "a1",
      sql: fake.asSql(),
    });
    const copy = client.clone();

    await copy.reconnect();
    await copy.close();

    expect(client.connected).toBe(true);
    expect(fake.end).not.toHaveBeenCalled();
    await expect(client.newLock("nightly").info()).resolves.toMatchObject({
      acquired: false,
    });
    expect(fake.queries.at(-1)?.values).toContain("glock:nightly");
  });

  it("should reject table names that are not SQL identifiers", () => {
    expect(() =>
      createPostgresConfig({ tableName: "locks; DROP TABLE users" }),
    ).toThrow("Invalid table name - must be a valid SQL identifier");
  });

  it("should default the table name", () => {
    expect(createPostgresConfig({ clientId: "a1" }).tableName).toBe(
      "leaselock_locks",
    );
  });
});

describe("setupSchema", () => {
  it("should create the table and the expiry index", async () => {
    const fake = createFakeSql();

    await setupSchema(fake.asSql(), { tableName: "job_locks" });

    expect(fake.unsafe).toHaveBeenCalledTimes(2);
    expect(fake.unsafe.mock.calls[0]?.[0]).toContain(
      "CREATE TABLE IF NOT EXISTS job_locks",
    );
    expect(fake.unsafe.mock.calls[1]?.[0]).toContain(
      "CREATE INDEX IF NOT EXISTS idx_job_locks_expires",
    );
  });

  it("should refuse unsafe table names", async () => {
    const fake = createFakeSql();

    await expect(
      setupSchema(fake.asSql(), { tableName: "x y" }),
    ).rejects.toMatchObject({ code: "InvalidArgument" });
    expect(fake.unsafe).not.toHaveBeenCalled();
  });
});
