export * from "./logger";
export * from "./clients/http";
export * from "./clients/healthApi";
export * from "./catalog";
export * from "./records";
export * from "./orchestration";
export * from "./config";
export * from "./db";
