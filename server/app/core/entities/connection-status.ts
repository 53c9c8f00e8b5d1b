export type BackendConnection = "connected" | "disconnected" | "error";

export interface ConnectionMonitorStatus {
  last_connection_status: boolean | null;
  initial_connection_failed: boolean;
  connection_recovered: boolean;
  monitoring_enabled: boolean;
  last_success_time: string | null;
  monitoring_interval: number;
}
