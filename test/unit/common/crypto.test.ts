// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Unit tests for crypto utilities (makeStorageKey, generateClientId, hashKey)
 */

import { describe, expect, it } from "vitest";
import {
  generateClientId,
  hashKey,
  makeStorageKey,
} from "../../../common/crypto.js";

describe("makeStorageKey", () => {
  it("should join namespace and name when the key fits", () => {
    expect(makeStorageKey("glock", "job-7", 1000, 5)).toBe("glock:job-7");
  });

  it("should keep trailing colons of the namespace verbatim", () => {
    expect(makeStorageKey("glock:", "job-7", 1000, 5)).toBe("glock::job-7");
    expect(makeStorageKey("glock::", "job-7", 1000, 5)).toBe("glock:::job-7");
  });

  it("should use the bare name when the namespace is empty", () => {
    expect(makeStorageKey("", "job-7", 1000, 0)).toBe("job-7");
  });

  it("should normalize the name to NFC", () => {
    expect(makeStorageKey("t", "cafe\u0301", 1000, 5)).toBe("t:caf\u00e9");
  });

  it("should keep a key that exactly fits limit minus reserve", () => {
    const name = "n".repeat(33); // "p:" + 33 bytes + 5 reserved = 40

    expect(makeStorageKey("p", name, 40, 5)).toBe(`p:${name}`);
  });

  it("should hash a key one byte over the limit", () => {
    const key = makeStorageKey("p", "n".repeat(34), 40, 5);

    expect(key).toMatch(/^p:[A-Za-z0-9_-]{22}$/);
  });

  it("should hash deterministically and per namespace", () => {
    const name = "x".repeat(2000);

    const first = makeStorageKey("tenant-a", name, 1000, 5);
    const again = makeStorageKey("tenant-a", name, 1000, 5);
    const other = makeStorageKey("tenant-b", name, 1000, 5);

    expect(first).toBe(again);
    expect(other.slice("tenant-b:".length)).not.toBe(
      first.slice("tenant-a:".length),
    );
  });

  it("should reject a namespace that leaves no room", () => {
    expect(() => makeStorageKey("x".repeat(996), "a", 1000, 5)).toThrow(
      "Namespace exceeds backend key limit",
    );
  });

  it("should reject an empty name", () => {
    expect(() => makeStorageKey("glock", "", 1000, 5)).toThrow(
      "Name must not be empty",
    );
  });
});

describe("generateClientId", () => {
  it("should produce 22 base64url characters", () => {
    expect(generateClientId()).toMatch(/^[A-Za-z0-9_-]{22}$/);
  });

  it("should not repeat", () => {
    const ids = new Set(Array.from({ length: 100 }, generateClientId));

    expect(ids.size).toBe(100);
  });
});

describe("hashKey", () => {
  it("should produce 24 hex characters", () => {
    expect(hashKey("job-7")).toMatch(/^[0-9a-f]{24}$/);
  });

  it("should be deterministic and NFC-insensitive", () => {
    expect(hashKey("job-7")).toBe(hashKey("job-7"));
    expect(hashKey("cafe\u0301")).toBe(hashKey("caf\u00e9"));
  });

  it("should separate different values", () => {
    expect(hashKey("job-7")).not.toBe(hashKey("job-8"));
  });
});
