export * from "./server-phase";
export * from "./connection-status";
export * from "./health-report";
export * from "./release-version";
