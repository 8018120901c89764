// src/tests/unit/crypto.test.ts
import { describe, expect, it } from "vitest";
import { getDummyPasswordHash, hashPassword, verifyPassword } from "../../libs/crypto.js";

describe("password hashing", () => {
  it("verifies the right password only", async () => {
    const hash = await hashPassword("correct horse", 4);

    expect(hash.startsWith("$2")).toBe(true);
    expect(await verifyPassword(hash, "correct horse")).toBe(true);
    expect(await verifyPassword(hash, "wrong horse")).toBe(false);
  });

  it("returns false for something that is not a bcrypt hash", async () => {
    expect(await verifyPassword("plain-text", "plain-text")).toBe(false);
  });

  it("computes the dummy hash once", async () => {
    const first = await getDummyPasswordHash();
    expect(await getDummyPasswordHash()).toBe(first);
  });
});
