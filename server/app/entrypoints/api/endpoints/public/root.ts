import { Router } from "express";
import { IHealthService } from "../../../../core/interfaces";
import type { HealthSummary } from "../../../../core/entities";
import type { EndpointMap, RootResponse } from "../../schemas/health";
import { rejectOtherMethods } from "../metrics/health";

export const ENDPOINTS: EndpointMap = {
  health: "/api/v1/health",
  detailed_health: "/api/v1/health/detailed",
  liveness: "/health"
};

export const ROOT_ERROR_WARNING = "Unable to verify the backend server connection.";

// The welcome page stays "degraded" when the summary itself failed.
function toRootResponse({ error, ...summary }: HealthSummary): RootResponse {
  if (summary.status !== "unhealthy") {
    return { ...summary, endpoints: ENDPOINTS };
  }
  return {
    ...summary,
    status: "degraded",
    warning: error ? `${ROOT_ERROR_WARNING} (${error})` : ROOT_ERROR_WARNING,
    endpoints: ENDPOINTS
  };
}

export function registerRootEndpoint(router: Router, healthService: IHealthService): void {
  router.get("/", async (_req, res, next) => {
    try {
      if (healthService.phase() !== "serving") {
        res.status(503).json(healthService.liveness());
        return;
      }
      res.json(toRootResponse(await healthService.summary()));
    } catch (err) {
      next(err);
    }
  });
  router.all("/", rejectOtherMethods);
}
