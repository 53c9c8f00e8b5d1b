import { Router, type Request, type Response, type NextFunction } from "express";
import { IHealthService } from "../../../../core/interfaces";
import { MethodNotAllowedError } from "../../../../core/errors";

export function rejectOtherMethods(req: Request, _res: Response, next: NextFunction): void {
  next(new MethodNotAllowedError(req.method, ["GET", "HEAD"]));
}

function statusFor(healthService: IHealthService): number {
  return healthService.phase() === "serving" ? 200 : 503;
}

export function registerLivenessEndpoint(router: Router, healthService: IHealthService): void {
  router.get("/health", (_req, res) => {
    res.status(statusFor(healthService)).json(healthService.liveness());
  });
  router.all("/health", rejectOtherMethods);
}

export function registerHealthEndpoints(router: Router, healthService: IHealthService): void {
  router.get("/health", async (_req, res, next) => {
    try {
      if (healthService.phase() !== "serving") {
        res.status(503).json(healthService.liveness());
        return;
      }
      res.json(await healthService.summary());
    } catch (err) {
      next(err);
    }
  });
  router.all("/health", rejectOtherMethods);

  router.get("/health/detailed", async (_req, res, next) => {
    try {
      if (healthService.phase() !== "serving") {
        res.status(503).json(healthService.liveness());
        return;
      }
      res.json(await healthService.detailed());
    } catch (err) {
      next(err);
    }
  });
  router.all("/health/detailed", rejectOtherMethods);
}
