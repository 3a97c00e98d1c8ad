/**
 * Wire the production fetch service from an AppConfig
 *
 * Opens the database, applies pending migrations, loads the catalog and
 * checks the table against it before anything is fetched.
 */

import type { AppConfig, EndpointCatalog } from "@/types";
import { openDb, runMigrations, verifyHealthRecordsSchema } from "@/db";
import { loadEndpointCatalog } from "@/catalog";
import { HealthApiClient } from "@/clients/healthApi";
import { SqliteStorageGateway } from "@/storage";
import { FetchOrchestrator } from "./fetchOrchestrator";
import { HealthFetchService } from "./healthFetchService";
import * as logger from "@/logger";

export type CreateFetchServiceOptions = {
  /** Catalog to use instead of data/endpoints.json */
  catalog?: EndpointCatalog;
};

export function createFetchService(
  config: AppConfig,
  options: CreateFetchServiceOptions = {},
): HealthFetchService {
  const db = openDb(config.db.path);
  runMigrations(db);

  const catalog = options.catalog ?? loadEndpointCatalog();
  verifyHealthRecordsSchema(catalog);

  logger.debug("Endpoint catalog loaded", {
    version: catalog.version,
    endpoints: catalog.endpoints.length,
    columns: catalog.columns.length,
  });

  const storage = new SqliteStorageGateway();
  const client = new HealthApiClient({
    credentials: config.api.credentials,
    baseUrl: config.api.baseUrl,
    timeoutMs: config.api.timeoutMs,
    deadlineMs: config.api.deadlineMs,
  });
  const orchestrator = new FetchOrchestrator(
    { client, storage, catalog },
    {
      endpointConcurrency: config.fetch.endpointConcurrency,
      dateConcurrency: config.fetch.dateConcurrency,
    },
  );

  return new HealthFetchService(orchestrator, storage, catalog, {
    timeZone: config.fetch.timeZone,
  });
}
