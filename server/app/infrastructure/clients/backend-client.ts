import http from "node:http";
import https from "node:https";
import type { AxiosInstance } from "axios";
import { IBackendClient } from "../../core/interfaces";
import { makeHttpClient } from "../http";
import { Env } from "../../entrypoints/api/env";

export interface BackendClientOptions {
  baseURL?: string;
  healthTimeoutMs?: number;
  retries?: number;
}

/** Talks to the backend server that owns the databases and API keys. */
export class BackendClient implements IBackendClient {
  private readonly httpAgent = new http.Agent({ keepAlive: true });
  private readonly httpsAgent = new https.Agent({ keepAlive: true });
  private readonly http: AxiosInstance;

  constructor(options: BackendClientOptions = {}) {
    this.http = makeHttpClient(options.baseURL ?? Env.BACKEND_BASE_URL, {
      timeoutMs: options.healthTimeoutMs ?? Env.BACKEND_HEALTH_TIMEOUT_MS,
      retries: options.retries ?? Env.HTTP_RETRIES,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent
    });
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.http.get("/health");
      return response.status === 200;
    } catch (err) {
      console.error(`Backend health check failed: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
