import express, { type Express } from "express";
import { createApiRouter, errorHandler, notFoundHandler } from "./router";
import { registerLivenessEndpoint } from "./endpoints/metrics/health";
import { registerRootEndpoint } from "./endpoints/public/root";
import { BackendClient } from "../../infrastructure/clients/backend-client";
import { ConnectionMonitor } from "../../core/services/connection-monitor";
import { HealthService } from "../../core/services/health-service";
import { IBackendClient, IConnectionMonitor, IHealthService } from "../../core/interfaces";
import { Env } from "./env";

export interface AppDependencies {
  backend: IBackendClient;
  monitor: IConnectionMonitor;
  health: IHealthService;
}

export function createDependencies(): AppDependencies {
  const backend = new BackendClient();
  const monitor = new ConnectionMonitor();
  const health = new HealthService(backend, monitor, {
    serviceName: Env.SERVICE_NAME,
    version: Env.SERVICE_VERSION
  });
  return { backend, monitor, health };
}

export function createApp(deps: AppDependencies = createDependencies()): Express {
  const app = express();
  app.disable("x-powered-by");

  const publicRouter = express.Router();
  registerLivenessEndpoint(publicRouter, deps.health);
  registerRootEndpoint(publicRouter, deps.health);

  app.use(publicRouter);
  app.use("/api/v1", createApiRouter(deps.health));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
