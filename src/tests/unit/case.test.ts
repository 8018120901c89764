// src/tests/unit/case.test.ts
import { describe, expect, it } from "vitest";
import { toKebabCase, toSnakeCase, toTitleCase } from "../../libs/case.js";

describe("case helpers", () => {
  it("snake-cases every non-alphanumeric", () => {
    expect(toSnakeCase("Acme Portal")).toBe("acme_portal");
    expect(toSnakeCase("My-App 2.0")).toBe("my_app_2_0");
  });

  it("kebab-cases every non-alphanumeric", () => {
    expect(toKebabCase("user_settings")).toBe("user-settings");
    expect(toKebabCase("Team Reports")).toBe("team-reports");
  });

  it("title-cases underscores and dashes as word breaks", () => {
    expect(toTitleCase("user_settings")).toBe("User Settings");
    expect(toTitleCase("api-KEYS")).toBe("Api Keys");
  });
});
