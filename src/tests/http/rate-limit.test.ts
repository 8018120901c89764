// src/tests/http/rate-limit.test.ts
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTestApp, type TestContext } from "../support/test-app.js";

let t: TestContext;

function badLogin(remoteAddress = "127.0.0.1") {
  return t.app.inject({ method: "POST", url: "/auth/login", remoteAddress, payload: {} });
}

describe("rate limiting", () => {
  beforeEach(async () => {
    t = await createTestApp({ settings: { features: { rateLimit: true, auditLogging: true } } });
  });

  afterEach(async () => {
    await t.app.close();
  });

  it("reports the remaining budget", async () => {
    const res = await badLogin();

    expect(res.statusCode).toBe(400);
    expect(res.headers["ratelimit-limit"]).toBe("20");
    expect(res.headers["ratelimit-remaining"]).toBe("19");
  });

  it("answers 429 once the credential budget is spent", async () => {
    for (let i = 0; i < 20; i++) {
      expect((await badLogin()).statusCode).toBe(400);
    }

    const res = await badLogin();

    expect(res.statusCode).toBe(429);
    expect(res.headers["retry-after"]).toBeDefined();
    expect(res.json()).toMatchObject({
      status: 429,
      error: { code: "RATE_LIMITED", message: "Too many requests." },
    });
  });

  it("counts each client separately", async () => {
    for (let i = 0; i < 21; i++) await badLogin("10.0.0.1");

    const res = await badLogin("10.0.0.2");

    expect(res.statusCode).toBe(400);
  });

  it("never limits the health endpoints", async () => {
    for (let i = 0; i < 130; i++) await t.app.inject({ method: "GET", url: "/health" });

    const res = await t.app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["ratelimit-limit"]).toBeUndefined();
  });
});
