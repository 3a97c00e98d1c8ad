/**
 * Application configuration type definitions
 */

import type { LogLevel } from "./logger";

export type HealthApiCredentials = {
  secretKey: string;
  clientKey: string;
};

export type AppConfig = {
  api: {
    baseUrl: string;
    credentials: HealthApiCredentials;
    /** Per-attempt timeout */
    timeoutMs: number;
    /** Hard ceiling for one endpoint call, retries included */
    deadlineMs: number;
  };
  fetch: {
    endpointConcurrency: number;
    dateConcurrency: number;
    /** IANA zone used to decide what "today" is */
    timeZone: string;
  };
  db: {
    path: string;
  };
  logLevel: LogLevel;
};
