export * from "./backend-client";
export * from "./connection-monitor";
export * from "./health-service";
