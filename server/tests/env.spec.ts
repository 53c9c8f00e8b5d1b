import { describe, expect, it } from "vitest";
import { loadEnv } from "../app/entrypoints/api/env";

describe("loadEnv", () => {
  it("falls back to defaults", () => {
    expect(loadEnv({})).toEqual({
      PORT: 35816,
      HOST: "127.0.0.1",
      PORT_ANNOUNCE_PREFIX: "SERVER_PORT",
      SERVICE_NAME: "ai-server",
      SERVICE_VERSION: "1.0.0",
      BACKEND_BASE_URL: "http://localhost:39722",
      HTTP_RETRIES: 1,
      BACKEND_HEALTH_TIMEOUT_MS: 5000,
      ENABLE_CONNECTION_MONITORING: false,
      MONITORING_INTERVAL: 10,
      SHUTDOWN_TIMEOUT_MS: 5000
    });
  });

  it("parses overrides", () => {
    const env = loadEnv({ PORT: "0", ENABLE_CONNECTION_MONITORING: "TRUE", MONITORING_INTERVAL: "2.5" });

    expect(env.PORT).toBe(0);
    expect(env.ENABLE_CONNECTION_MONITORING).toBe(true);
    expect(env.MONITORING_INTERVAL).toBe(2.5);
  });

  it("treats empty numeric values as unset", () => {
    const env = loadEnv({ PORT: "", MONITORING_INTERVAL: "", SHUTDOWN_TIMEOUT_MS: "" });

    expect(env.PORT).toBe(35816);
    expect(env.MONITORING_INTERVAL).toBe(10);
    expect(env.SHUTDOWN_TIMEOUT_MS).toBe(5000);
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadEnv({ PORT: "70000" })).toThrow(/^Invalid environment: PORT: /);
  });

  it("rejects an unknown flag value", () => {
    expect(() => loadEnv({ ENABLE_CONNECTION_MONITORING: "maybe" })).toThrow(/ENABLE_CONNECTION_MONITORING/);
  });
});
