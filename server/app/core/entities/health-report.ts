import type { BackendConnection, ConnectionMonitorStatus } from "./connection-status";

export interface LivenessReport {
  status: "ok" | "shutting_down";
}

export interface HealthSummary {
  status: "healthy" | "degraded" | "unhealthy";
  message: string;
  version: string;
  backend_connection: BackendConnection;
  timestamp: string;
  warning?: string;
  error?: string;
}

export interface ComponentHealth {
  status: "healthy" | "unhealthy";
}

export interface DetailedHealthReport {
  status: "healthy" | "partial";
  services: {
    backend: ComponentHealth;
  };
  connection_monitor: ConnectionMonitorStatus;
  uptime_seconds: number;
  timestamp: string;
}
