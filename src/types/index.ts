export * from "./logger";
export * from "./clients/http";
export * from "./clients/healthApi";
export * from "./catalog";
export * from "./records";
export * from "./progress";
export * from "./storage";
export * from "./config";
export * from "./orchestration";
