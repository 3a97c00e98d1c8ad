/**
 * HealthApiClient: bearer-token client for the health department API
 *
 * Implements EndpointClient. One token is shared by every concurrent call;
 * a 401 drops it, fetches a fresh one once and retries the call once.
 */

import type { EndpointClient } from "@/interfaces";
import type {
  DateKey,
  EndpointFailure,
  EndpointResult,
  EndpointSpec,
  HealthApiCredentials,
  HealthApiDateParams,
  HttpRequest,
  HttpRequestFn,
} from "@/types";
import {
  httpRequest as defaultHttpRequest,
  HttpDeadlineError,
  HttpError,
  isStatusRetryable,
  isTransientHttpError,
} from "@/clients/http";
import { PermanentEndpointError, TransientEndpointError } from "@/errors";
import {
  HEALTH_API_DEFAULT_BASE_URL,
  HEALTH_API_DEFAULT_DEADLINE_MS,
  HEALTH_API_DEFAULT_TIMEOUT_MS,
  HEALTH_API_MAX_ATTEMPTS,
  HEALTH_API_RETRY_DELAY_MS,
  HEALTH_API_TOKEN_PATH,
} from "@/constants/clients/healthApi";
import { extractEndpointPayload, extractToken } from "./mappers";
import * as logger from "@/logger";

export interface HealthApiClientConfig {
  credentials: HealthApiCredentials;
  /** Defaults to HEALTH_API_DEFAULT_BASE_URL */
  baseUrl?: string;
  timeoutMs?: number;
  deadlineMs?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
}

/**
 * Token request failed or returned no token
 */
class TokenUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TokenUnavailableError";
  }
}

/**
 * Per-call state shared by the token and endpoint requests
 */
type CallContext = {
  url: string;
  deadlineMs: number;
  /** Epoch ms after which no request of this call may run */
  deadlineAt: number;
  onAttempt: (attempt: number) => void;
};

/**
 * @throws {HttpDeadlineError} When the call has no time left
 */
function remainingBudget(call: CallContext): number {
  const remaining = call.deadlineAt - Date.now();
  if (remaining <= 0) {
    throw new HttpDeadlineError(call.url, call.deadlineMs);
  }
  return remaining;
}

/**
 * Settle with `work`, or reject with HttpDeadlineError once the call's budget runs out
 */
async function withinBudget<T>(work: Promise<T>, call: CallContext): Promise<T> {
  const remaining = remainingBudget(call);
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new HttpDeadlineError(call.url, call.deadlineMs)), remaining);
  });
  try {
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}

export class HealthApiClient implements EndpointClient {
  private readonly baseUrl: string;
  private readonly credentials: HealthApiCredentials;
  private readonly timeoutMs: number;
  private readonly deadlineMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly httpRequest: HttpRequestFn;
  private tokenPromise: Promise<string> | null = null;
  private token: string | null = null;

  constructor(config: HealthApiClientConfig) {
    const missing: string[] = [];
    if (!config.credentials.secretKey) missing.push("secretKey");
    if (!config.credentials.clientKey) missing.push("clientKey");
    if (missing.length > 0) {
      throw new Error(`Health API credentials missing: ${missing.join(", ")}`);
    }

    this.credentials = config.credentials;
    this.baseUrl = (config.baseUrl ?? HEALTH_API_DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? HEALTH_API_DEFAULT_TIMEOUT_MS;
    this.deadlineMs = config.deadlineMs ?? HEALTH_API_DEFAULT_DEADLINE_MS;
    this.maxAttempts = config.maxAttempts ?? HEALTH_API_MAX_ATTEMPTS;
    this.retryDelayMs = config.retryDelayMs ?? HEALTH_API_RETRY_DELAY_MS;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;

    logger.debug("HealthApiClient initialized", { baseUrl: this.baseUrl });
  }

  /**
   * One endpoint call for one date. Token requests, the 401 refresh and
   * every retry share a single `deadlineMs` budget.
   */
  async fetch(date: DateKey, endpoint: EndpointSpec): Promise<EndpointResult> {
    const startedAt = Date.now();
    let attempts = 0;
    const call: CallContext = {
      url: `${this.baseUrl}/${endpoint.path}`,
      deadlineMs: this.deadlineMs,
      deadlineAt: startedAt + this.deadlineMs,
      onAttempt: () => {
        attempts++;
      },
    };

    let failure: EndpointFailure;
    try {
      const body = await this.callWithToken(date, endpoint, call);
      const extracted = extractEndpointPayload(body);
      if (extracted.ok) {
        return {
          ok: true,
          endpointId: endpoint.id,
          payload: extracted.payload,
          attempts,
          durationMs: Date.now() - startedAt,
        };
      }
      failure = extracted.failure;
    } catch (error) {
      failure = toEndpointFailure(toEndpointError(endpoint.id, error));
    }

    logger.debug("Endpoint call failed", {
      date,
      endpoint: endpoint.id,
      kind: failure.kind,
      attempts,
      error: failure.message,
    });

    return {
      ok: false,
      endpointId: endpoint.id,
      failure,
      attempts,
      durationMs: Date.now() - startedAt,
    };
  }

  /**
   * Drop the cached token so the next call fetches a new one
   */
  invalidateToken(): void {
    this.tokenPromise = null;
    this.token = null;
  }

  private async callWithToken(
    date: DateKey,
    endpoint: EndpointSpec,
    call: CallContext,
  ): Promise<unknown> {
    const token = await this.getToken(call);
    try {
      return await this.httpRequest(this.buildEndpointRequest(date, endpoint, token, call));
    } catch (error) {
      if (!(error instanceof HttpError) || error.status !== 401) {
        throw error;
      }
    }

    logger.debug("Token refused, refreshing", { endpoint: endpoint.id });
    this.dropToken(token);
    const freshToken = await this.getToken(call);
    return await this.httpRequest(
      this.buildEndpointRequest(date, endpoint, freshToken, call),
    );
  }

  /**
   * The API reads the dates from a JSON body, GET requests included
   */
  private buildEndpointRequest(
    date: DateKey,
    endpoint: EndpointSpec,
    token: string,
    call: CallContext,
  ): HttpRequest {
    const params: HealthApiDateParams = { tdate: date, dEndDate: date };
    return {
      method: endpoint.method,
      url: call.url,
      headers: { Authorization: `Bearer ${token}` },
      json: params,
      timeoutMs: this.timeoutMs,
      deadlineMs: remainingBudget(call),
      idempotent: true,
      retry: {
        maxAttempts: this.maxAttempts,
        baseDelayMs: this.retryDelayMs,
        backoff: "fixed",
      },
      onAttempt: call.onAttempt,
    };
  }

  /**
   * Shared token, requested at most once at a time
   *
   * A caller waits for a token request started by another call only as
   * long as its own budget allows.
   */
  private async getToken(call: CallContext): Promise<string> {
    if (this.tokenPromise === null) {
      this.tokenPromise = this.startTokenRequest(remainingBudget(call));
    }
    return await withinBudget(this.tokenPromise, call);
  }

  private startTokenRequest(deadlineMs: number): Promise<string> {
    const pending: Promise<string> = this.requestToken(deadlineMs).then(
      (token) => {
        if (this.tokenPromise === pending) {
          this.token = token;
        }
        return token;
      },
      (error: unknown) => {
        if (this.tokenPromise === pending) {
          this.tokenPromise = null;
        }
        throw error;
      },
    );
    return pending;
  }

  /**
   * Forget `token` unless another caller already replaced it
   */
  private dropToken(token: string): void {
    if (this.token === token) {
      this.invalidateToken();
    }
  }

  private async requestToken(deadlineMs: number): Promise<string> {
    let body: unknown;
    try {
      body = await this.httpRequest({
        method: "POST",
        url: `${this.baseUrl}/${HEALTH_API_TOKEN_PATH}`,
        json: {
          secretKey: this.credentials.secretKey,
          clientKey: this.credentials.clientKey,
        },
        timeoutMs: this.timeoutMs,
        deadlineMs,
        idempotent: true,
        retry: {
          maxAttempts: this.maxAttempts,
          baseDelayMs: this.retryDelayMs,
          backoff: "fixed",
        },
      });
    } catch (error) {
      if (error instanceof HttpDeadlineError || isTransientHttpError(error)) {
        throw error;
      }
      throw new TokenUnavailableError(
        `token request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    const token = extractToken(body);
    if (token === null) {
      throw new TokenUnavailableError("token response carried no token");
    }
    logger.debug("Health API token obtained");
    return token;
  }
}

/**
 * Classify anything thrown during an endpoint call
 */
function toEndpointError(
  endpointId: string,
  error: unknown,
): TransientEndpointError | PermanentEndpointError {
  if (error instanceof TransientEndpointError || error instanceof PermanentEndpointError) {
    return error;
  }
  if (error instanceof TokenUnavailableError) {
    return new PermanentEndpointError(endpointId, "unauthorized", error.message, {
      cause: error,
    });
  }
  if (error instanceof HttpError) {
    if (error.status === 401 || error.status === 403) {
      return new PermanentEndpointError(
        endpointId,
        "unauthorized",
        `HTTP ${error.status} after token refresh`,
        { cause: error },
      );
    }
    if (isStatusRetryable(error.status)) {
      return new TransientEndpointError(endpointId, `HTTP ${error.status}`, { cause: error });
    }
    return new PermanentEndpointError(endpointId, "rejected", `HTTP ${error.status}`, {
      cause: error,
    });
  }
  if (error instanceof HttpDeadlineError || isTransientHttpError(error)) {
    return new TransientEndpointError(
      endpointId,
      error instanceof Error ? error.message : String(error),
      { cause: error },
    );
  }
  return new PermanentEndpointError(
    endpointId,
    "unexpected",
    error instanceof Error ? error.message : String(error),
    { cause: error },
  );
}

function toEndpointFailure(
  error: TransientEndpointError | PermanentEndpointError,
): EndpointFailure {
  return { kind: error.kind, message: error.message };
}
