import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp, type AppDependencies } from "../app/entrypoints/api/app";
import { ServerLifecycle } from "../app/entrypoints/api/lifecycle";
import { ENDPOINTS, ROOT_ERROR_WARNING } from "../app/entrypoints/api/endpoints/public/root";
import { ConnectionMonitor } from "../app/core/services/connection-monitor";
import { HealthService } from "../app/core/services/health-service";
import { backendWith, silenceConsole, type FakeBackend } from "./fakes";

describe("HTTP API", () => {
  let backend: FakeBackend;
  let deps: AppDependencies;
  let lifecycle: ServerLifecycle;
  let baseUrl: string;

  beforeAll(async () => {
    silenceConsole();
    backend = backendWith(true);
    const monitor = new ConnectionMonitor();
    const health = new HealthService(backend, monitor, { serviceName: "ai-server", version: "9.9.9" });
    deps = { backend, monitor, health };
    lifecycle = new ServerLifecycle(createApp(deps), deps, {
      host: "127.0.0.1",
      port: 0,
      announcePrefix: "SERVER_PORT",
      enableMonitoring: false,
      monitoringIntervalSeconds: 10,
      shutdownTimeoutMs: 1000,
      announce: () => {}
    });
    const port = await lifecycle.start();
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    await lifecycle.stop();
    vi.restoreAllMocks();
  });

  beforeEach(() => {
    backend.healthCheck.mockResolvedValue(true);
    deps.health.setPhase("serving");
  });

  it("answers GET /health with 200", async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("answers HEAD /health with 200", async () => {
    const res = await fetch(`${baseUrl}/health`, { method: "HEAD" });

    expect(res.status).toBe(200);
  });

  it("answers GET /api/v1/health with the backend state", async () => {
    const res = await fetch(`${baseUrl}/api/v1/health`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      status: "healthy",
      message: "ai-server is running",
      version: "9.9.9",
      backend_connection: "connected"
    });
  });

  it("still answers 200 while the backend is down", async () => {
    backend.healthCheck.mockResolvedValue(false);

    const res = await fetch(`${baseUrl}/api/v1/health`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: "degraded", backend_connection: "disconnected" });
  });

  it("serves the detailed report", async () => {
    const res = await fetch(`${baseUrl}/api/v1/health/detailed`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      status: "healthy",
      services: { backend: { status: "healthy" } },
      connection_monitor: { monitoring_enabled: false }
    });
  });

  it("lists the endpoints at the root", async () => {
    const res = await fetch(`${baseUrl}/`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: "healthy", endpoints: ENDPOINTS });
  });

  it("reports the root as degraded when the backend check throws", async () => {
    backend.healthCheck.mockRejectedValue(new Error("boom"));

    const res = await fetch(`${baseUrl}/`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      status: "degraded",
      backend_connection: "error",
      warning: `${ROOT_ERROR_WARNING} (health check failed)`,
      endpoints: ENDPOINTS
    });
    expect(body).not.toHaveProperty("error");
  });

  it("answers 500 when a handler fails unexpectedly", async () => {
    vi.spyOn(deps.health, "detailed").mockRejectedValueOnce(new Error("boom"));

    const res = await fetch(`${baseUrl}/api/v1/health/detailed`);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ ok: false, error: "internal_error" });
  });

  it.each([
    ["POST", "/health"],
    ["PUT", "/api/v1/health"],
    ["DELETE", "/api/v1/health/detailed"],
    ["PATCH", "/"]
  ])("rejects %s %s with 405", async (method, path) => {
    const res = await fetch(`${baseUrl}${path}`, { method });

    expect(res.status).toBe(405);
    expect(res.headers.get("allow")).toBe("GET, HEAD");
    expect(await res.json()).toEqual({ ok: false, error: `method ${method} not allowed` });
  });

  it("answers unknown paths with 404", async () => {
    const res = await fetch(`${baseUrl}/api/v1/healthz`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ ok: false, error: "no route for GET /api/v1/healthz" });
  });

  it("answers 503 while shutting down", async () => {
    deps.health.setPhase("shutting_down");

    const live = await fetch(`${baseUrl}/health`);
    const summary = await fetch(`${baseUrl}/api/v1/health`);

    expect(live.status).toBe(503);
    expect(await live.json()).toEqual({ status: "shutting_down" });
    expect(summary.status).toBe(503);
  });

  it("answers 503 at the root while shutting down without calling the backend", async () => {
    deps.health.setPhase("shutting_down");
    backend.healthCheck.mockClear();

    const res = await fetch(`${baseUrl}/`);

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ status: "shutting_down" });
    expect(backend.healthCheck).not.toHaveBeenCalled();
  });
});
