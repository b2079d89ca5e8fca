/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

export type HttpQueryValue = string | number | boolean;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, HttpQueryValue | HttpQueryValue[]>;
  json?: unknown;
  timeoutMs?: number;
  /** Secret values masked in logged URLs and error messages */
  redact?: string[];
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
}

/**
 * HTTP request function type for dependency injection
 */
export type HttpRequestFn = <T>(req: HttpRequest) => Promise<T>;
