/**
 * Uniform fetch-failure policy for provider clients
 *
 * A provider that cannot be reached is "no data", not a fatal error: the
 * failure is logged and the caller gets null.
 */

import type { HttpRequest, HttpRequestFn, Provider } from "@/types";
import { HttpError, HttpTimeoutError } from "@/clients/http";
import * as logger from "@/logger";

/**
 * Perform one request; resolve to null instead of rejecting on failure
 */
export async function fetchOrEmpty<T>(
  provider: Provider,
  httpRequest: HttpRequestFn,
  req: HttpRequest,
): Promise<T | null> {
  try {
    return await httpRequest<T>(req);
  } catch (err) {
    if (err instanceof HttpError) {
      logger.error("Provider API returned an error status", {
        provider,
        status: err.status,
        error: err.message,
      });
    } else if (err instanceof HttpTimeoutError) {
      logger.error("Provider API timed out", {
        provider,
        timeoutMs: err.timeoutMs,
      });
    } else {
      logger.error("Provider API request failed", {
        provider,
        error: logger.describeError(err),
      });
    }
    return null;
  }
}
