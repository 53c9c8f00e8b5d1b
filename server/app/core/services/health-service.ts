import { IBackendClient, IConnectionMonitor, IHealthService } from "../interfaces";
import { DetailedHealthReport, HealthSummary, LivenessReport, ServerPhase } from "../entities";

const BACKEND_WARNING = "Backend server connection is unstable. Some features may be limited.";

export interface HealthServiceOptions {
  serviceName: string;
  version: string;
  now?: () => Date;
  uptimeSeconds?: () => number;
}

export class HealthService implements IHealthService {
  private currentPhase: ServerPhase = "serving";
  private readonly now: () => Date;
  private readonly uptimeSeconds: () => number;

  constructor(
    private readonly backend: IBackendClient,
    private readonly monitor: IConnectionMonitor,
    private readonly options: HealthServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.uptimeSeconds = options.uptimeSeconds ?? (() => Math.floor(process.uptime()));
  }

  phase(): ServerPhase {
    return this.currentPhase;
  }

  setPhase(phase: ServerPhase): void {
    this.currentPhase = phase;
  }

  liveness(): LivenessReport {
    return { status: this.currentPhase === "serving" ? "ok" : "shutting_down" };
  }

  async probeBackend(): Promise<boolean> {
    const healthy = await this.backend.healthCheck();
    if (healthy) {
      await this.monitor.recordCallSuccess("health check");
    } else {
      this.monitor.recordCallFailure("health check");
    }
    return healthy;
  }

  async summary(): Promise<HealthSummary> {
    try {
      const backendHealthy = await this.probeBackend();
      const report: HealthSummary = {
        status: backendHealthy ? "healthy" : "degraded",
        message: `${this.options.serviceName} is running`,
        version: this.options.version,
        backend_connection: backendHealthy ? "connected" : "disconnected",
        timestamp: this.now().toISOString()
      };
      if (!backendHealthy) {
        report.warning = BACKEND_WARNING;
        console.warn("Health summary: backend connection failed");
      }
      return report;
    } catch (err) {
      console.error(`Health summary failed: ${err instanceof Error ? err.message : String(err)}`);
      return {
        status: "unhealthy",
        message: this.options.serviceName,
        version: this.options.version,
        backend_connection: "error",
        error: "health check failed",
        timestamp: this.now().toISOString()
      };
    }
  }

  async detailed(): Promise<DetailedHealthReport> {
    let backendHealthy = false;
    try {
      backendHealthy = await this.probeBackend();
    } catch (err) {
      console.error(`Backend probe failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    return {
      status: backendHealthy ? "healthy" : "partial",
      services: {
        backend: { status: backendHealthy ? "healthy" : "unhealthy" }
      },
      connection_monitor: this.monitor.getStatus(),
      uptime_seconds: this.uptimeSeconds(),
      timestamp: this.now().toISOString()
    };
  }
}
