/**
 * Application configuration: read and validate environment variables once
 *
 * The entry point loads .env through dotenv before calling loadAppConfig().
 */

import type { AppConfig, LogLevel } from "@/types";
import {
  DEFAULT_DATE_CONCURRENCY,
  DEFAULT_DB_PATH,
  DEFAULT_ENDPOINT_CONCURRENCY,
  DEFAULT_FETCH_TIMEZONE,
  DEFAULT_LOG_LEVEL,
  HEALTH_API_DEFAULT_BASE_URL,
  HEALTH_API_DEFAULT_DEADLINE_MS,
  HEALTH_API_DEFAULT_TIMEOUT_MS,
} from "@/constants";
import { parseLogLevel } from "@/logger";

export type ConfigIssue = {
  variable: string;
  problem: string;
};

/**
 * Error thrown when one or more variables are missing or invalid
 */
export class ConfigValidationError extends Error {
  public readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map((issue) => `${issue.variable} ${issue.problem}`)
        .join("; ")}`,
    );
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

type Env = Record<string, string | undefined>;

export type LoadAppConfigOptions = {
  /** Commands that never call the API (migrate) skip the credential check */
  requireCredentials?: boolean;
};

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Build the AppConfig from an environment map
 *
 * @throws {ConfigValidationError} Naming every missing or invalid variable
 */
export function loadAppConfig(
  env: Env = process.env,
  options: LoadAppConfigOptions = {},
): AppConfig {
  const requireCredentials = options.requireCredentials ?? true;
  const issues: ConfigIssue[] = [];

  const credential = (name: string): string => {
    const value = readString(env, name);
    if (value === undefined) {
      if (!requireCredentials) {
        return "";
      }
      issues.push({ variable: name, problem: "is required" });
      return "";
    }
    return value;
  };

  const positiveInt = (name: string, fallback: number): number => {
    const raw = readString(env, name);
    if (raw === undefined) {
      return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
      issues.push({ variable: name, problem: `must be a positive integer, got "${raw}"` });
      return fallback;
    }
    return value;
  };

  const baseUrl = readString(env, "API_BASE_URL") ?? HEALTH_API_DEFAULT_BASE_URL;
  if (!/^https?:\/\//i.test(baseUrl)) {
    issues.push({ variable: "API_BASE_URL", problem: `must be an http(s) URL, got "${baseUrl}"` });
  }

  const secretKey = credential("API_SECRET_KEY");
  const clientKey = credential("API_CLIENT_KEY");
  const timeoutMs = positiveInt("API_TIMEOUT_MS", HEALTH_API_DEFAULT_TIMEOUT_MS);
  const deadlineMs = positiveInt("API_DEADLINE_MS", HEALTH_API_DEFAULT_DEADLINE_MS);
  const endpointConcurrency = positiveInt(
    "FETCH_ENDPOINT_CONCURRENCY",
    DEFAULT_ENDPOINT_CONCURRENCY,
  );
  const dateConcurrency = positiveInt("FETCH_DATE_CONCURRENCY", DEFAULT_DATE_CONCURRENCY);

  const timeZone = readString(env, "FETCH_TIMEZONE") ?? DEFAULT_FETCH_TIMEZONE;
  if (!isValidTimeZone(timeZone)) {
    issues.push({ variable: "FETCH_TIMEZONE", problem: `is not a known time zone: "${timeZone}"` });
  }

  let logLevel: LogLevel = DEFAULT_LOG_LEVEL;
  const rawLevel = readString(env, "LOG_LEVEL");
  if (rawLevel !== undefined) {
    const parsed = parseLogLevel(rawLevel);
    if (parsed === null) {
      issues.push({
        variable: "LOG_LEVEL",
        problem: `must be one of debug, info, warn, error, got "${rawLevel}"`,
      });
    } else {
      logLevel = parsed;
    }
  }

  if (issues.length > 0) {
    throw new ConfigValidationError(issues);
  }

  return {
    api: {
      baseUrl,
      credentials: { secretKey, clientKey },
      timeoutMs,
      deadlineMs,
    },
    fetch: { endpointConcurrency, dateConcurrency, timeZone },
    db: { path: readString(env, "DB_PATH") ?? DEFAULT_DB_PATH },
    logLevel,
  };
}
