import http from "node:http";
import https from "node:https";

import axios, { type AxiosAdapter, type AxiosInstance } from "axios";

import { AbortedError, classifyResponse, HttpError, httpError } from "./errors.js";
import { redactForLog, redactText } from "./policy.js";
import { conflictPolicy, rateLimitPolicy, runWithRetry, type RetryPolicy, type RetryStats } from "./retry.js";
import type { TokenCache } from "./token-cache.js";
import type { ClientConfig, HttpMethod, JsonObject, SleepFn } from "./types.js";
import { isPlainObject, logInfo, logWarn, sleep as defaultSleep } from "./utils.js";

export type RequestOptions = {
  body?: unknown;
  headers?: Record<string, string>;
  /** Policies applied on top of the rate-limit policy every request runs under. */
  policies?: RetryPolicy[];
  signal?: AbortSignal;
};

export type SessionResponse = {
  status: number;
  data: unknown;
  headers: Record<string, string>;
};

export type HttpSessionOptions = {
  adapter?: AxiosAdapter;
  sleep?: SleepFn;
  random?: () => number;
  redactionFields?: Set<string>;
};

type Transport = {
  http: AxiosInstance;
  httpAgent: http.Agent;
  httpsAgent: https.Agent;
};

/**
 * Authenticated access to the REST API over one shared connection pool. The
 * pool is created on first use (or first use after `close()`) and reused until
 * closed.
 */
export class HttpSession {
  readonly rateLimit: RetryPolicy;

  readonly conflict: RetryPolicy;

  private transport: Transport | null = null;

  private readonly sleep: SleepFn;

  private readonly redactionFields: Set<string>;

  constructor(
    private readonly tokens: TokenCache,
    readonly config: ClientConfig,
    private readonly options: HttpSessionOptions = {},
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.redactionFields = options.redactionFields ?? new Set();
    this.rateLimit = rateLimitPolicy({
      maxAttempts: config.rateLimitMaxAttempts,
      defaultWaitMs: config.rateLimitDefaultWaitMs,
    });
    this.conflict = conflictPolicy({
      maxAttempts: config.conflictMaxAttempts,
      minWaitMs: config.conflictMinWaitMs,
      maxWaitMs: config.conflictMaxWaitMs,
      random: options.random,
    });
  }

  get isOpen(): boolean {
    return this.transport !== null;
  }

  open(): AxiosInstance {
    if (this.transport) return this.transport.http;

    const httpAgent = new http.Agent({ keepAlive: true });
    const httpsAgent = new https.Agent({ keepAlive: true });
    const instance = axios.create({
      timeout: this.config.httpTimeoutMs,
      adapter: this.options.adapter,
      httpAgent,
      httpsAgent,
      validateStatus: () => true,
    });
    this.transport = { http: instance, httpAgent, httpsAgent };
    return instance;
  }

  async close(): Promise<void> {
    const transport = this.transport;
    if (!transport) return;
    this.transport = null;
    transport.httpAgent.destroy();
    transport.httpsAgent.destroy();
  }

  resolveUrl(pathOrUrl: string): string {
    if (/^https?:\/\//i.test(pathOrUrl)) return pathOrUrl;
    return `${this.config.baseUrl}/${pathOrUrl.replace(/^\/+/, "")}`;
  }

  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<SessionResponse> {
    const fullUrl = this.resolveUrl(url);
    const logUrl = redactText(fullUrl);
    const policies = [this.rateLimit, ...(options.policies ?? [])];
    const stats: RetryStats = { attempts: 0, retriesByPolicy: {} };
    const startedAt = Date.now();

    try {
      const resp = await runWithRetry(
        () => this.send(method, fullUrl, options),
        policies,
        { sleep: this.sleep, signal: options.signal, operation: `${method} ${logUrl}` },
        stats,
      );
      logInfo("pbi.request", {
        method,
        url: logUrl,
        status: resp.status,
        attempts: stats.attempts,
        durationMs: Date.now() - startedAt,
      });
      return resp;
    } catch (error) {
      const logPayload: JsonObject = {
        method,
        url: logUrl,
        status: error instanceof HttpError ? error.statusCode : null,
        attempts: stats.attempts,
        durationMs: Date.now() - startedAt,
        error: error instanceof Error ? error.message : String(error),
      };
      if (error instanceof HttpError) logPayload.errorDetails = redactForLog(error.details, this.redactionFields);
      logWarn("pbi.request.failed", logPayload);
      throw error;
    }
  }

  get(url: string, options: Omit<RequestOptions, "body"> = {}): Promise<SessionResponse> {
    return this.request("GET", url, options);
  }

  post(url: string, options: RequestOptions = {}): Promise<SessionResponse> {
    return this.request("POST", url, options);
  }

  patch(url: string, options: RequestOptions = {}): Promise<SessionResponse> {
    return this.request("PATCH", url, options);
  }

  delete(url: string, options: Omit<RequestOptions, "body"> = {}): Promise<SessionResponse> {
    return this.request("DELETE", url, options);
  }

  /** GETs a JSON document; an enveloped list comes back as the bare array. */
  async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const resp = await this.get(url, { signal });
    if (isPlainObject(resp.data) && Array.isArray(resp.data.value)) return resp.data.value;
    return resp.data;
  }

  /** GETs a list endpoint and strips its `{"value": [...]}` envelope. */
  async listValues(url: string, signal?: AbortSignal): Promise<unknown[]> {
    const resp = await this.get(url, { signal });
    return unwrapValue(resp.data, this.resolveUrl(url));
  }

  buildHeaders(authorization: string, extra: Record<string, string> = {}): Record<string, string> {
    const headers: Record<string, string> = { ...extra };
    const hasContentType = Object.keys(headers).some((k) => k.toLowerCase() === "content-type");
    if (!hasContentType) headers["Content-Type"] = "application/json";
    for (const key of Object.keys(headers)) {
      if (key.toLowerCase() === "authorization") delete headers[key];
    }
    headers.Authorization = authorization;
    return headers;
  }

  private async send(method: HttpMethod, url: string, options: RequestOptions): Promise<SessionResponse> {
    const instance = this.open();
    const authorization = await this.tokens.getAuthorizationHeader(options.signal);
    const headers = this.buildHeaders(authorization, options.headers);

    const resp = await instance
      .request<unknown>({
        method,
        url,
        headers,
        data: options.body,
        signal: options.signal,
      })
      .catch((e: unknown) => {
        if (options.signal?.aborted) throw new AbortedError(`${method} ${url} aborted.`);
        throw e;
      });

    const responseHeaders = normalizeHeaders(resp.headers);
    if (resp.status < 200 || resp.status >= 300) {
      throw classifyResponse(method, url, resp.status, parseBody(resp.data), responseHeaders);
    }
    return {
      status: resp.status,
      data: parseBody(resp.data),
      headers: responseHeaders,
    };
  }
}

export function unwrapValue(data: unknown, context: string): unknown[] {
  if (isPlainObject(data) && Array.isArray(data.value)) return data.value;
  throw httpError(502, `Expected a {"value": [...]} envelope from ${context}.`, data);
}

function parseBody(data: unknown): unknown {
  if (typeof data !== "string") return data;
  const trimmed = data.trim();
  if (!trimmed) return null;
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
    try {
      return JSON.parse(trimmed);
    } catch {
      return data;
    }
  }
  return data;
}

function normalizeHeaders(raw: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (raw === null || typeof raw !== "object") return out;
  for (const [k, v] of Object.entries(raw)) {
    if (v === undefined || v === null) continue;
    out[k.toLowerCase()] = Array.isArray(v) ? v.map(String).join(", ") : String(v);
  }
  return out;
}
