export * from "./types";
export * from "./errors";
export * from "./logger";
export * from "./rate-limiter";
export * from "./usage";
export * from "./extraction-gateway";
