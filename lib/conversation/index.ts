export * from "./errors";
export * from "./invoice-repository";
export * from "./session-store";
export * from "./orchestrator";
