import type { Server } from "node:http";
import type { Express } from "express";
import type { AppDependencies } from "./app";

export interface LifecycleOptions {
  host: string;
  port: number;
  announcePrefix: string;
  enableMonitoring: boolean;
  monitoringIntervalSeconds: number;
  shutdownTimeoutMs: number;
  announce?: (line: string) => void;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Owns the listening socket and the startup/shutdown sequence around it.
 */
export class ServerLifecycle {
  private server: Server | null = null;
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly app: Express,
    private readonly deps: AppDependencies,
    private readonly options: LifecycleOptions
  ) {}

  async start(): Promise<number> {
    const server = await this.listen();
    this.server = server;

    const address = server.address();
    const port = address && typeof address === "object" ? address.port : this.options.port;
    const announce = this.options.announce ?? ((line: string) => console.log(line));
    announce(`${this.options.announcePrefix}:${port}`);

    await this.checkBackend();
    return port;
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private listen(): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.options.port, this.options.host);
      const onError = (err: Error) => {
        server.off("listening", onListening);
        reject(err);
      };
      const onListening = () => {
        server.off("error", onError);
        resolve(server);
      };
      server.once("error", onError);
      server.once("listening", onListening);
    });
  }

  private async checkBackend(): Promise<void> {
    const { backend, monitor } = this.deps;
    try {
      if (await backend.healthCheck()) {
        console.log("Backend server connection established");
        monitor.markInitialSuccess();
      } else {
        console.warn("Backend server unreachable; connection will be retried on the first request");
        monitor.markInitialFailure();
      }
    } catch (err) {
      console.warn(`Initial backend connection failed: ${describeError(err)}`);
      console.log("Service starting in lazy initialization mode");
      monitor.markInitialFailure();
    }

    if (!this.options.enableMonitoring) {
      return;
    }
    if (monitor.isInitialConnectionFailed()) {
      await monitor.start(backend, this.options.monitoringIntervalSeconds);
    } else {
      console.log("Initial connection succeeded; background monitoring not started");
    }
  }

  private async shutdown(): Promise<void> {
    console.log("Shutting down");
    this.deps.health.setPhase("shutting_down");

    try {
      await this.deps.monitor.stop();
    } catch (err) {
      console.error(`Failed to stop connection monitoring: ${describeError(err)}`);
    }

    try {
      await this.deps.backend.close();
      console.log("Backend client closed");
    } catch (err) {
      console.error(`Failed to close backend client: ${describeError(err)}`);
    }

    if (this.server) {
      try {
        await this.closeServer(this.server);
      } catch (err) {
        console.error(`Failed to close HTTP server: ${describeError(err)}`);
      }
      this.server = null;
    }
    console.log("Shutdown complete");
  }

  private closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
      const deadline = setTimeout(() => {
        console.warn("Shutdown timeout reached, closing remaining connections");
        server.closeAllConnections();
      }, this.options.shutdownTimeoutMs);
      deadline.unref();

      server.close((err) => {
        clearTimeout(deadline);
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
      server.closeIdleConnections();
    });
  }
}
