import { describe, it, expect, afterEach, vi } from "vitest";
import { _resetConfigCache } from "../../src/config/index.js";
import { resolveAllowedOrigins } from "../../src/server.js";

describe("resolveAllowedOrigins", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    _resetConfigCache();
  });

  function withEnv(vars: Record<string, string>): void {
    for (const [key, value] of Object.entries(vars)) vi.stubEnv(key, value);
    _resetConfigCache();
  }

  it("allows every origin in development without an allowlist", () => {
    withEnv({ NODE_ENV: "development", ALLOWED_ORIGINS: "" });
    expect(resolveAllowedOrigins()).toBe(true);
  });

  it("falls back to same-origin in production without an allowlist", () => {
    withEnv({ NODE_ENV: "production", ALLOWED_ORIGINS: "" });
    expect(resolveAllowedOrigins()).toBe(false);
  });

  it("returns the parsed allowlist", () => {
    withEnv({ NODE_ENV: "production", ALLOWED_ORIGINS: "https://a.test, https://b.test" });
    expect(resolveAllowedOrigins()).toEqual(["https://a.test", "https://b.test"]);
  });

  it("rejects a wildcard in production", () => {
    withEnv({ NODE_ENV: "production", ALLOWED_ORIGINS: "*" });
    expect(() => resolveAllowedOrigins()).toThrow("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  });

  it("accepts a wildcard outside production", () => {
    withEnv({ NODE_ENV: "development", ALLOWED_ORIGINS: "*" });
    expect(resolveAllowedOrigins()).toEqual(["*"]);
  });
});
