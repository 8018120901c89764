// src/tests/http/audit-logs.test.ts
import { afterEach, describe, expect, it } from "vitest";
import {
  ADMIN_EMAIL,
  ADMIN_PASSWORD,
  bearer,
  createTestApp,
  loginAs,
  type TestContext,
} from "../support/test-app.js";

let t: TestContext;

describe("GET /audit-logs", () => {
  afterEach(async () => {
    await t.app.close();
  });

  it("returns the tenant's entries newest first", async () => {
    t = await createTestApp();
    await t.app.inject({
      method: "POST",
      url: "/auth/login",
      payload: { email: ADMIN_EMAIL, password: "wrong password" },
    });
    const { access_token } = await loginAs(t.app, ADMIN_EMAIL, ADMIN_PASSWORD);

    const res = await t.app.inject({ method: "GET", url: "/audit-logs", headers: bearer(access_token) });

    expect(res.statusCode).toBe(200);
    const entries = res.json();
    expect(entries.map((e: { action: string }) => e.action)).toEqual(["login", "login_failed"]);
    expect(typeof entries[0].timestamp).toBe("string");
    expect(entries[1]).toMatchObject({ success: false, error_message: "invalid_credentials" });
  });

  it("filters by action", async () => {
    t = await createTestApp();
    await t.app.inject({
      method: "POST",
      url: "/auth/login",
      payload: { email: ADMIN_EMAIL, password: "wrong password" },
    });
    const { access_token } = await loginAs(t.app, ADMIN_EMAIL, ADMIN_PASSWORD);

    const res = await t.app.inject({
      method: "GET",
      url: "/audit-logs?action=login_failed",
      headers: bearer(access_token),
    });

    expect(res.json()).toHaveLength(1);
  });

  it("rejects an unknown action", async () => {
    t = await createTestApp();
    const { access_token } = await loginAs(t.app, ADMIN_EMAIL, ADMIN_PASSWORD);

    const res = await t.app.inject({
      method: "GET",
      url: "/audit-logs?action=explode",
      headers: bearer(access_token),
    });

    expect(res.statusCode).toBe(400);
  });

  it("is admin-only", async () => {
    t = await createTestApp();
    await t.createUser({ email: "ivan@example.com", password: "correct horse" });
    const { access_token } = await loginAs(t.app, "ivan@example.com", "correct horse");

    const res = await t.app.inject({ method: "GET", url: "/audit-logs", headers: bearer(access_token) });

    expect(res.statusCode).toBe(403);
  });

  it("keeps nothing in the database when audit logging is off", async () => {
    t = await createTestApp({ settings: { features: { rateLimit: false, auditLogging: false } } });
    const { access_token } = await loginAs(t.app, ADMIN_EMAIL, ADMIN_PASSWORD);

    const res = await t.app.inject({ method: "GET", url: "/audit-logs", headers: bearer(access_token) });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual([]);
    expect(t.dataSource.tables.auditLogs).toEqual([]);
  });
});
