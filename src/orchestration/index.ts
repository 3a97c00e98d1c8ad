/**
 * Orchestration barrel exports
 */

export { FetchOrchestrator } from "./fetchOrchestrator";
export type { FetchOrchestratorDeps } from "./fetchOrchestrator";
export { FetchJob, FetchJobAlreadyStartedError } from "./fetchJob";
export { ProgressStream, ProgressStreamClosedError } from "./progressStream";
export { DateEventSequencer } from "./dateEventSequencer";
export { HealthFetchService } from "./healthFetchService";
export type { FetchRun, HealthFetchServiceOptions } from "./healthFetchService";
export { createFetchService } from "./createFetchService";
export type { CreateFetchServiceOptions } from "./createFetchService";
