import type { HealthSummary } from "../../../core/entities";

export interface ErrorResponse {
  ok: false;
  error: string;
}

export interface EndpointMap {
  health: string;
  detailed_health: string;
  liveness: string;
}

export interface RootResponse extends Omit<HealthSummary, "error"> {
  endpoints: EndpointMap;
}
