/**
 * Runner entrypoint: command-line transport for the fetch service
 *
 * Usage:
 *   tsx src/runnerMain.ts today
 *   tsx src/runnerMain.ts range 2024-01-01 2024-01-31
 *   tsx src/runnerMain.ts status
 *   tsx src/runnerMain.ts endpoints
 *   tsx src/runnerMain.ts migrate
 *
 * Progress events are written to stdout as one JSON object per line; logs
 * go to stderr. The first SIGINT/SIGTERM cancels the job after the dates in
 * flight finish, a second one exits immediately.
 *
 * Environment variables (see .env.example):
 *   - API_SECRET_KEY, API_CLIENT_KEY: token credentials (required to fetch)
 *   - API_BASE_URL, API_TIMEOUT_MS, API_DEADLINE_MS
 *   - FETCH_ENDPOINT_CONCURRENCY, FETCH_DATE_CONCURRENCY, FETCH_TIMEZONE
 *   - DB_PATH: SQLite file (defaults to data/app.db)
 *   - LOG_LEVEL: debug, info, warn, error
 */

import "dotenv/config";
import type { BatchSummary } from "./types";
import { loadAppConfig } from "./config";
import { closeDb, openDb, runMigrations } from "./db";
import { createFetchService } from "./orchestration";
import type { FetchRun } from "./orchestration";
import * as logger from "./logger";

const USAGE = "Usage: runnerMain <today | range <from> <to> | status | endpoints | migrate>";

function writeLine(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value)}\n`);
}

/**
 * Stream a run's events to stdout and return its summary
 */
async function streamRun(run: FetchRun): Promise<BatchSummary | null> {
  let shutdownRequested = false;

  const handleShutdown = (signal: string) => {
    if (shutdownRequested) {
      logger.warn("Forced shutdown - exiting immediately");
      process.exit(1);
    }
    logger.info("Shutdown signal received, stopping after dates in flight", {
      signal,
      jobId: run.jobId,
    });
    shutdownRequested = true;
    run.cancel();
  };

  const onSigint = () => handleShutdown("SIGINT");
  const onSigterm = () => handleShutdown("SIGTERM");
  process.on("SIGINT", onSigint);
  process.on("SIGTERM", onSigterm);

  let summary: BatchSummary | null = null;
  try {
    for await (const event of run.events) {
      writeLine(event);
      if (event.type === "batch_done") {
        summary = event.summary;
      }
    }
  } finally {
    process.off("SIGINT", onSigint);
    process.off("SIGTERM", onSigterm);
  }
  return summary;
}

async function runCommand(command: string | undefined, args: string[]): Promise<number> {
  if (command === "migrate") {
    const config = loadAppConfig(process.env, { requireCredentials: false });
    logger.configureLogger({ level: config.logLevel });
    const applied = runMigrations(openDb(config.db.path));
    writeLine({ applied });
    return 0;
  }

  if (
    command !== "today" &&
    command !== "range" &&
    command !== "status" &&
    command !== "endpoints"
  ) {
    console.error(USAGE);
    return 1;
  }

  const config = loadAppConfig();
  logger.configureLogger({ level: config.logLevel });
  const service = createFetchService(config);

  switch (command) {
    case "status":
      writeLine(await service.status());
      return 0;
    case "endpoints":
      for (const endpoint of service.listEndpoints()) {
        writeLine(endpoint);
      }
      return 0;
    case "today":
    case "range": {
      if (command === "range" && args.length !== 2) {
        console.error(USAGE);
        return 1;
      }
      const run = command === "today" ? service.runToday() : service.runRange(args[0], args[1]);
      logger.info("Fetch started", { jobId: run.jobId, dates: run.dates.length });

      const summary = await streamRun(run);
      if (summary === null) {
        logger.error("Fetch ended without a summary", { jobId: run.jobId });
        return 1;
      }
      return summary.errored > 0 ? 1 : 0;
    }
  }
}

async function main() {
  // stdout carries the NDJSON output
  logger.configureLogger({ stderrOnly: true });

  const [command, ...args] = process.argv.slice(2);
  let exitCode: number;
  try {
    exitCode = await runCommand(command, args);
  } catch (error) {
    logger.error("Command failed", {
      command,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    exitCode = 1;
  } finally {
    closeDb();
  }
  process.exit(exitCode);
}

void main();
