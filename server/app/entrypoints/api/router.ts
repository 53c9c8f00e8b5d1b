import { Router, type Request, type Response, type NextFunction } from "express";
import { IHealthService } from "../../core/interfaces";
import { registerHealthEndpoints } from "./endpoints/metrics/health";
import { MethodNotAllowedError, NotFoundError } from "../../core/errors";
import type { ErrorResponse } from "./schemas/health";

export function createApiRouter(healthService: IHealthService): Router {
  const router = Router();

  registerHealthEndpoints(router, healthService);

  return router;
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`no route for ${req.method} ${req.path}`));
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const send = (status: number, error: string) => {
    const body: ErrorResponse = { ok: false, error };
    res.status(status).json(body);
  };

  if (err instanceof NotFoundError) {
    return send(err.status, err.message);
  }
  if (err instanceof MethodNotAllowedError) {
    res.setHeader("Allow", err.allowed.join(", "));
    return send(err.status, err.message);
  }
  console.error(err);
  return send(500, "internal_error");
}
