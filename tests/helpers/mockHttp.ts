/**
 * Mock HTTP Harness for offline client tests
 *
 * Provides a controllable HTTP mock that:
 * - Returns canned JSON for registered routes
 * - Replays a sequence of replies for one route (e.g. 401 then 200)
 * - Throws loudly on unmocked requests (prevents accidental real calls)
 *
 * Usage:
 *   const mock = createMockHttp();
 *   mock.on("POST", `${BASE_URL}/generateToken`, { token: "test-token" });
 *   const client = new HealthApiClient({ credentials, baseUrl: BASE_URL, httpRequest: mock.request });
 */

import type { HttpRequest, HttpRequestFn } from "@/types";
import { HttpError } from "@/clients/http";

type RouteKey = string; // "METHOD URL"
type RouteHandler = (req: HttpRequest) => Promise<unknown>;

type MockHttpHeaders = Record<string, string>;

export type MockHttpResponse = {
  status: number;
  body: unknown;
  headers?: MockHttpHeaders;
};

type MockHttpReply = MockHttpResponse & { __mockHttpReply: true };

/**
 * Wrap a status/body pair so custom handlers can return non-2xx replies
 */
export function mockReply(input: MockHttpResponse): MockHttpReply {
  return { __mockHttpReply: true, ...input };
}

function isReply(value: unknown): value is MockHttpReply {
  return (
    typeof value === "object" &&
    value !== null &&
    "__mockHttpReply" in value &&
    value.__mockHttpReply === true
  );
}

export interface MockHttp {
  /**
   * Register a 200 response for a given method+url
   */
  on(method: string, url: string, response: unknown): void;

  /**
   * Register a response with explicit status/body/headers
   */
  onResponse(method: string, url: string, response: MockHttpResponse): void;

  /**
   * Register replies returned in order; the last one repeats
   */
  onSequence(method: string, url: string, responses: MockHttpResponse[]): void;

  /**
   * Register a custom handler for a given method+url
   */
  onCustom(method: string, url: string, handler: RouteHandler): void;

  /**
   * Mock httpRequest function (inject into clients)
   */
  request: HttpRequestFn;

  /**
   * Recorded requests, optionally filtered by URL
   */
  getRecordedRequests(url?: string): HttpRequest[];

  reset(): void;
}

/**
 * Build route key from method and URL (ignores query params)
 */
function buildRouteKey(method: string, url: string): RouteKey {
  const urlWithoutQuery = url.split("?")[0];
  return `${method.toUpperCase()} ${urlWithoutQuery}`;
}

export function createMockHttp(): MockHttp {
  const routes = new Map<RouteKey, RouteHandler>();
  const recordedRequests: HttpRequest[] = [];

  const onCustom = (method: string, url: string, handler: RouteHandler): void => {
    routes.set(buildRouteKey(method, url), handler);
  };

  const on = (method: string, url: string, response: unknown): void => {
    onCustom(method, url, async () => mockReply({ status: 200, body: response }));
  };

  const onResponse = (method: string, url: string, response: MockHttpResponse): void => {
    onCustom(method, url, async () => mockReply(response));
  };

  const onSequence = (method: string, url: string, responses: MockHttpResponse[]): void => {
    let calls = 0;
    onCustom(method, url, async () => {
      const response = responses[Math.min(calls, responses.length - 1)];
      calls++;
      return mockReply(response);
    });
  };

  const request = async (req: HttpRequest): Promise<unknown> => {
    recordedRequests.push({ ...req });
    req.onAttempt?.(1);

    const key = buildRouteKey(req.method, req.url);
    const handler = routes.get(key);

    if (!handler) {
      throw new Error(
        `[MockHttp] Unmocked request: ${key}\n` +
          `All HTTP requests must be explicitly mocked to prevent accidental network calls.\n` +
          `Available routes: ${Array.from(routes.keys()).join(", ") || "(none)"}`,
      );
    }

    const response = await handler(req);

    if (!isReply(response)) {
      return response;
    }

    if (response.status >= 200 && response.status < 300) {
      return response.body;
    }

    throw new HttpError({
      status: response.status,
      statusText: "Mock Response",
      url: req.url,
      bodySnippet:
        typeof response.body === "string" ? response.body : JSON.stringify(response.body),
      headers: response.headers ? new Headers(response.headers) : undefined,
    });
  };

  const getRecordedRequests = (url?: string): HttpRequest[] =>
    recordedRequests.filter((req) => url === undefined || req.url.split("?")[0] === url);

  const reset = (): void => {
    routes.clear();
    recordedRequests.length = 0;
  };

  return { on, onResponse, onSequence, onCustom, request, getRecordedRequests, reset };
}
