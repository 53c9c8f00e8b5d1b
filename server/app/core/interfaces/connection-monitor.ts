import type { ConnectionMonitorStatus } from "../entities";
import type { IBackendClient } from "./backend-client";

export interface IConnectionMonitor {
  markInitialSuccess(): void;
  markInitialFailure(): void;
  recordCallSuccess(operation?: string): Promise<boolean>;
  recordCallFailure(operation?: string): void;
  start(client: IBackendClient, intervalSeconds?: number): Promise<void>;
  stop(): Promise<void>;
  isInitialConnectionFailed(): boolean;
  getStatus(): ConnectionMonitorStatus;
}
