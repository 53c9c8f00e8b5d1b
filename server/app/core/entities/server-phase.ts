export type ServerPhase = "serving" | "shutting_down";
