import { AxiosError } from "axios";

import type { JsonObject } from "./types.js";

export class AuthError extends Error {
  readonly statusCode = 401;

  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = "AuthError";
    this.details = details;
  }
}

/** Non-2xx response from the service. */
export class HttpError extends Error {
  readonly statusCode: number;

  readonly details: unknown;

  readonly headers: Record<string, string>;

  readonly method: string;

  readonly url: string;

  constructor(method: string, url: string, status: number, body: unknown, headers: Record<string, string> = {}) {
    super(`${method} ${url} failed with status ${status}: ${summarizeBody(body)}`);
    this.name = "HttpError";
    this.statusCode = status;
    this.details = body;
    this.headers = headers;
    this.method = method;
    this.url = url;
  }

  get status(): number {
    return this.statusCode;
  }
}

export class ConflictError extends HttpError {
  constructor(method: string, url: string, status: number, body: unknown, headers: Record<string, string> = {}) {
    super(method, url, status, body, headers);
    this.name = "ConflictError";
  }
}

export class RateLimitError extends HttpError {
  /** Server-suggested wait from `Retry-After`, or null when absent or unparseable. */
  readonly retryAfterMs: number | null;

  constructor(method: string, url: string, body: unknown, headers: Record<string, string> = {}) {
    super(method, url, 429, body, headers);
    this.name = "RateLimitError";
    this.retryAfterMs = parseRetryAfterSeconds(headers["retry-after"]);
  }
}

export class NotFoundError extends Error {
  readonly statusCode = 404;

  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = "NotFoundError";
    this.details = details;
  }
}

export class AbortedError extends Error {
  readonly statusCode = 499;

  constructor(message = "Operation aborted.") {
    super(message);
    this.name = "AbortError";
  }
}

export class ValidationError extends Error {
  readonly statusCode: number;

  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = "ValidationError";
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function httpError(statusCode: number, message: string, details?: unknown): ValidationError {
  return new ValidationError(statusCode, message, details);
}

export function classifyResponse(
  method: string,
  url: string,
  status: number,
  body: unknown,
  headers: Record<string, string>,
): HttpError {
  if (status === 429) return new RateLimitError(method, url, body, headers);
  if (status === 400 || status === 409) return new ConflictError(method, url, status, body, headers);
  return new HttpError(method, url, status, body, headers);
}

/**
 * `Retry-After` is honored only as a positive number of seconds; HTTP-date values
 * and zero fall back to the policy default.
 */
export function parseRetryAfterSeconds(v: unknown): number | null {
  if (v === null || v === undefined) return null;
  const raw = Array.isArray(v) ? String(v[0] ?? "") : String(v);
  if (!raw.trim()) return null;

  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) return null;
  return Math.round(seconds * 1000);
}

export function describeError(e: unknown): { status: number; message: string; details?: unknown } {
  if (e instanceof AxiosError) {
    if (e.code === "ECONNABORTED" || e.code === "ETIMEDOUT") {
      return { status: 504, message: "Upstream request timed out.", details: e.code };
    }
    return { status: 502, message: e.message, details: e.code };
  }

  if (e instanceof Error && "statusCode" in e && typeof e.statusCode === "number") {
    const details = "details" in e ? e.details : undefined;
    return { status: e.statusCode, message: e.message, details };
  }

  if (e instanceof Error) return { status: 500, message: e.message };
  return { status: 500, message: String(e) };
}

function isObject(v: unknown): v is JsonObject {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function summarizeBody(body: unknown): string {
  if (body === null || body === undefined || body === "") return "<empty body>";
  if (typeof body === "string") return body.length > 200 ? `${body.slice(0, 197)}...` : body;
  if (isObject(body) && isObject(body.error)) {
    const code = typeof body.error.code === "string" ? body.error.code : "";
    const message = typeof body.error.message === "string" ? body.error.message : "";
    if (code || message) return [code, message].filter((x) => !!x).join(": ");
  }
  const text = JSON.stringify(body);
  return text.length > 200 ? `${text.slice(0, 197)}...` : text;
}
