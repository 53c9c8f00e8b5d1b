import { IBackendClient, IConnectionMonitor } from "../interfaces";
import { ConnectionMonitorStatus } from "../entities";

const ALERT_AFTER_FAILURES = 3;
const DEFAULT_INTERVAL_SECONDS = 60;

export type Clock = () => Date;

function formatDowntime(from: Date, to: Date): string {
  const totalSeconds = Math.max(0, Math.round((to.getTime() - from.getTime()) / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${hours}:${pad(minutes)}:${pad(seconds)}`;
}

/**
 * Tracks whether the backend server is reachable.
 *
 * Foreground calls report their outcome through `recordCallSuccess` and
 * `recordCallFailure`. After a failed startup check, `start` polls the backend
 * until it answers once, then stops by itself.
 */
export class ConnectionMonitor implements IConnectionMonitor {
  private lastConnectionStatus: boolean | null = null;
  private initialConnectionFailed = false;
  private connectionRecovered = false;
  private monitoringEnabled = false;
  private monitoringIntervalSeconds = DEFAULT_INTERVAL_SECONDS;
  private lastSuccessTime: Date | null = null;
  private failureStartTime: Date | null = null;
  private consecutiveFailures = 0;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(private readonly now: Clock = () => new Date()) {}

  markInitialFailure(): void {
    this.initialConnectionFailed = true;
    this.lastConnectionStatus = false;
    console.log("ConnectionMonitor: initial backend connection failed");
  }

  markInitialSuccess(): void {
    this.initialConnectionFailed = false;
    this.lastConnectionStatus = true;
    this.lastSuccessTime = this.now();
    console.log("ConnectionMonitor: initial backend connection succeeded");
  }

  isInitialConnectionFailed(): boolean {
    return this.initialConnectionFailed;
  }

  /** Returns true when this call is the first success after a failure. */
  async recordCallSuccess(operation = "API call"): Promise<boolean> {
    const current = this.now();
    const wasDown = this.initialConnectionFailed || this.lastConnectionStatus === false;

    if (wasDown && !this.connectionRecovered) {
      this.connectionRecovered = true;
      this.lastConnectionStatus = true;
      this.lastSuccessTime = current;
      this.logRecovery(current, operation);

      if (this.monitoringEnabled) {
        console.log("Backend connection recovered, stopping background monitoring");
        await this.stop();
      }
      return true;
    }

    this.lastSuccessTime = current;
    this.lastConnectionStatus = true;
    return false;
  }

  recordCallFailure(operation = "API call"): void {
    if (this.lastConnectionStatus === true) {
      console.warn(`Backend connection lost: ${operation} failed`);
      this.failureStartTime = this.now();
    }
    this.lastConnectionStatus = false;
    this.connectionRecovered = false;
  }

  async start(client: IBackendClient, intervalSeconds = DEFAULT_INTERVAL_SECONDS): Promise<void> {
    if (this.monitoringEnabled) {
      console.warn("ConnectionMonitor: monitoring is already running");
      return;
    }

    this.monitoringEnabled = true;
    this.monitoringIntervalSeconds = intervalSeconds;
    this.consecutiveFailures = 0;
    console.log(`ConnectionMonitor: watching backend every ${intervalSeconds}s`);

    this.schedule(client, 0);
  }

  async stop(): Promise<void> {
    if (!this.monitoringEnabled) {
      return;
    }
    this.monitoringEnabled = false;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    console.log("ConnectionMonitor: monitoring stopped");
  }

  /**
   * Runs one probe and applies the state transition. Resolves to false once
   * the loop should end.
   */
  async checkOnce(client: IBackendClient): Promise<boolean> {
    const currentStatus = await client.healthCheck();
    const current = this.now();

    if (this.lastConnectionStatus !== null) {
      if (!this.lastConnectionStatus && currentStatus) {
        this.logRecovery(current, "health check");
        this.connectionRecovered = true;
        this.consecutiveFailures = 0;
        this.lastConnectionStatus = true;
        this.lastSuccessTime = current;
        console.log("Backend connection recovered, stopping background monitoring");
        return false;
      }
      if (this.lastConnectionStatus && !currentStatus) {
        console.warn("Backend connection dropped: health check failed");
        this.failureStartTime = current;
        this.connectionRecovered = false;
        this.consecutiveFailures = 1;
      } else if (currentStatus) {
        this.consecutiveFailures = 0;
      } else {
        this.consecutiveFailures += 1;
      }
    } else {
      this.consecutiveFailures = currentStatus ? 0 : this.consecutiveFailures + 1;
    }

    if (currentStatus) {
      this.lastSuccessTime = current;
    }
    this.lastConnectionStatus = currentStatus;

    if (this.consecutiveFailures >= ALERT_AFTER_FAILURES) {
      console.error(
        `Backend unreachable for ${this.consecutiveFailures * this.monitoringIntervalSeconds}s`
      );
    }
    return true;
  }

  getStatus(): ConnectionMonitorStatus {
    return {
      last_connection_status: this.lastConnectionStatus,
      initial_connection_failed: this.initialConnectionFailed,
      connection_recovered: this.connectionRecovered,
      monitoring_enabled: this.monitoringEnabled,
      last_success_time: this.lastSuccessTime ? this.lastSuccessTime.toISOString() : null,
      monitoring_interval: this.monitoringIntervalSeconds
    };
  }

  private schedule(client: IBackendClient, delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.cycle(client).finally(() => {
        this.inFlight = null;
      });
    }, delayMs);
  }

  private async cycle(client: IBackendClient): Promise<void> {
    let keepGoing = true;
    try {
      keepGoing = await this.checkOnce(client);
    } catch (err) {
      console.error(`ConnectionMonitor: probe failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (!keepGoing) {
      this.monitoringEnabled = false;
      return;
    }
    if (this.monitoringEnabled) {
      this.schedule(client, this.monitoringIntervalSeconds * 1000);
    }
  }

  private logRecovery(current: Date, operation: string): void {
    if (this.failureStartTime) {
      console.log(
        `Backend connection recovered (downtime ${formatDowntime(this.failureStartTime, current)}): ${operation} succeeded`
      );
    } else {
      console.log(`Backend connection recovered: ${operation} succeeded`);
    }
  }
}
