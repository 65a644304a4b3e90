import { err, failures, type NetworkFailure, ok, type Result } from "@keyward/errors";
import type { ResolvedProtocolConfig } from "./config.js";

export type HttpMethod = "GET" | "POST";

export type HttpRequest = {
  operation: string;
  method: HttpMethod;
  path: string;
  body?: unknown;
  /**
   * Sent verbatim as the Authorization header.
   */
  token?: string;
};

export type HttpResponse = {
  status: number;
  headers: Headers;
  /**
   * Parsed JSON, or `undefined` when the body is empty or not JSON.
   */
  json: unknown;
};

export type HttpTransport = (request: HttpRequest) => Promise<Result<HttpResponse, NetworkFailure>>;

const parseJson = (text: string): unknown => {
  if (text.length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

const isAbortError = (error: unknown) => error instanceof Error && error.name === "AbortError";

/**
 * One request, one response: no retries, no redirects followed on our behalf.
 */
export const createHttpTransport = (
  config: Pick<ResolvedProtocolConfig, "baseUrl" | "fetch" | "timeoutMs" | "logger" | "now">,
): HttpTransport => {
  const { baseUrl, fetch: fetchFn, timeoutMs, logger, now } = config;

  return async (request) => {
    const { operation, method, path } = request;
    const controller = new AbortController();
    const startedAt = now();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    const headers: Record<string, string> = { Accept: "application/json" };
    if (request.body !== undefined) headers["Content-Type"] = "application/json";
    if (request.token !== undefined) headers.Authorization = request.token;

    logger({ type: "request", operation, method, path });

    try {
      const response = await fetchFn(`${baseUrl}${path}`, {
        method,
        headers,
        signal: controller.signal,
        ...(request.body !== undefined ? { body: JSON.stringify(request.body) } : {}),
      });
      const text = await response.text();
      logger({ type: "response", operation, method, path, status: response.status, durationMs: now() - startedAt });
      return ok({ status: response.status, headers: response.headers, json: parseJson(text) });
    } catch (error) {
      logger({ type: "error", operation, method, path, error, durationMs: now() - startedAt });
      return err(failures.network(isAbortError(error) ? "Request timed out" : "Request failed"));
    } finally {
      clearTimeout(timer);
    }
  };
};
