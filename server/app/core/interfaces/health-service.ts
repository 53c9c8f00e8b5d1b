import type { DetailedHealthReport, HealthSummary, LivenessReport, ServerPhase } from "../entities";

export interface IHealthService {
  liveness(): LivenessReport;
  summary(): Promise<HealthSummary>;
  detailed(): Promise<DetailedHealthReport>;
  probeBackend(): Promise<boolean>;
  phase(): ServerPhase;
  setPhase(phase: ServerPhase): void;
}
