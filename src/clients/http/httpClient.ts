/**
 * HTTP client wrapper — general-purpose JSON client using native fetch
 * Supports timeouts, query params, JSON bodies and structured error handling.
 * One attempt per call: callers decide what a failure means.
 */

import type { HttpRequest } from "@/types";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
} from "@/constants/clients/http";
import { isInteger, isSafeNumber, parse } from "lossless-json";
import { HttpError, HttpTimeoutError } from "./httpError";
import * as logger from "@/logger";

/**
 * Build URL with query parameters (supports arrays for repeated params)
 */
function buildUrl(baseUrl: string, query?: HttpRequest["query"]): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  Object.entries(query).forEach(([key, value]) => {
    if (Array.isArray(value)) {
      value.forEach((item) => url.searchParams.append(key, String(item)));
    } else {
      url.searchParams.append(key, String(value));
    }
  });

  return url.toString();
}

/**
 * Number reviver for response bodies: integers beyond 2^53 (Jooble ids)
 * become bigint, everything else a plain number
 */
export function parseJsonNumber(value: string): number | bigint {
  if (isInteger(value) && !isSafeNumber(value)) {
    return BigInt(value);
  }
  return parseFloat(value);
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(
  response: Response,
): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    return undefined;
  }
}

/**
 * Mask secrets (query-string keys, path-embedded API keys) before a URL
 * reaches a log line or an error message
 */
function redactUrl(url: string, secrets: readonly string[] = []): string {
  return secrets
    .filter((secret) => secret.length > 0)
    .reduce(
      (acc, secret) =>
        acc
          .split(secret)
          .join("***")
          .split(encodeURIComponent(secret))
          .join("***"),
      url,
    );
}

/**
 * Perform an HTTP request with timeout and error handling
 *
 * The body is parsed as JSON regardless of content type (RemoteOK serves
 * its feed as text/html on some edges); an unparseable body throws.
 * Integers too large for a double arrive as bigint.
 *
 * @template T - Expected response type (not validated)
 * @throws {HttpError} On non-2xx status codes
 * @throws {HttpTimeoutError} When the request exceeds its timeout
 * @throws {Error} On network errors or an unparseable body
 */
export async function httpRequest<T>(req: HttpRequest): Promise<T> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);
  const safeUrl = redactUrl(url, req.redact);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  // JSON defaults only with a body; caller headers override
  const headers: Record<string, string> = {};
  if (req.json !== undefined) {
    Object.assign(headers, DEFAULT_JSON_HEADERS);
  }
  Object.assign(headers, req.headers);

  const options: RequestInit = {
    method: req.method,
    headers,
    signal: controller.signal,
  };
  if (req.json !== undefined) {
    options.body = JSON.stringify(req.json);
  }

  logger.debug("HTTP request", { method: req.method, url: safeUrl, timeoutMs });

  try {
    const response = await fetch(url, options);

    if (!response.ok) {
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url: safeUrl,
        bodySnippet: await extractBodySnippet(response),
      });
    }

    const text = await response.text();
    return parse(text, null, parseJsonNumber) as T;
  } catch (err) {
    if (controller.signal.aborted) {
      throw new HttpTimeoutError(safeUrl, timeoutMs);
    }
    throw err;
  } finally {
    clearTimeout(timeoutId);
  }
}
