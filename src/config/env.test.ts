import { describe, it, expect } from "@jest/globals";
import { loadEnv } from "./env";

describe("loadEnv", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadEnv({})).toEqual({
      NODE_ENV: "development",
      PORT: 8000,
      DATABASE_URL: "./data/catalog.db",
      CORS_ORIGIN: "*",
      BODY_LIMIT: "100kb"
    });
  });

  it("coerces the port and parses boolean flags", () => {
    const parsed = loadEnv({ PORT: "3100", LOG_PRETTY: "false", LOG_LEVEL: "warn" });
    expect(parsed.PORT).toBe(3100);
    expect(parsed.LOG_PRETTY).toBe(false);
    expect(parsed.LOG_LEVEL).toBe("warn");
  });

  it("rejects invalid values with the offending key", () => {
    expect(() => loadEnv({ PORT: "not-a-port" })).toThrow(/^Invalid environment configuration: PORT: /);
    expect(() => loadEnv({ NODE_ENV: "staging" })).toThrow(/NODE_ENV/);
  });
});
