import http from "node:http";
import https from "node:https";
import axios, { AxiosInstance } from "axios";
import { ExternalServiceError } from "../core/errors";

// Type parameters must repeat axios's own declaration for the merge to apply.
declare module "axios" {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  interface AxiosRequestConfig<D = any> {
    retryCount?: number;
  }
}

export interface HttpClientOptions {
  timeoutMs: number;
  /** Extra attempts after a network error or 5xx. */
  retries: number;
  httpAgent?: http.Agent;
  httpsAgent?: https.Agent;
}

export function makeHttpClient(baseURL: string, options: HttpClientOptions): AxiosInstance {
  const client = axios.create({
    baseURL,
    timeout: options.timeoutMs,
    headers: { "Content-Type": "application/json" },
    httpAgent: options.httpAgent,
    httpsAgent: options.httpsAgent
  });

  client.interceptors.response.use(undefined, async (error: unknown) => {
    if (!axios.isAxiosError(error)) {
      throw error;
    }
    const cfg = error.config;
    const status = error.response?.status;
    const retriable = !status || (status >= 500 && status < 600);
    if (cfg && retriable && (cfg.retryCount ?? 0) < options.retries) {
      cfg.retryCount = (cfg.retryCount ?? 0) + 1;
      return client(cfg);
    }
    throw new ExternalServiceError(
      `HTTP ${status ?? "ERR"} for ${cfg?.baseURL ?? ""}${cfg?.url ?? ""}`,
      error,
      status
    );
  });

  return client;
}
