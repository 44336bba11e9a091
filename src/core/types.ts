import type { AxiosAdapter } from "axios";

export type JsonObject = Record<string, unknown>;

export type HttpishError = Error & {
  statusCode?: number;
  details?: unknown;
};

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type HttpMethod = "GET" | "POST" | "PATCH" | "PUT" | "DELETE";

// ---- Credentials ------------------------------------------------------------

export type ServicePrincipalCredential = {
  kind: "servicePrincipal";
  tenantId: string;
  clientId: string;
  clientSecret: string;
};

export type StaticTokenCredential = {
  kind: "staticToken";
  value: string;
};

export type Credential = ServicePrincipalCredential | StaticTokenCredential;

export type Token = {
  readonly accessToken: string;
  readonly issuedAt: number;
  readonly ttlMs: number;
  readonly scheme: "Bearer";
};

export type TokenExchangeRequest = {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  scope: string;
};

export type TokenExchangeResponse = {
  access_token?: string;
  expires_in?: number | string;
  error?: string;
  error_description?: string;
};

export type TokenExchange = (request: TokenExchangeRequest) => Promise<TokenExchangeResponse>;

// ---- Timing seams -------------------------------------------------------------

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export type Clock = {
  now: () => number;
  sleep: SleepFn;
  random: () => number;
};

// ---- Config -----------------------------------------------------------------

export type ClientConfig = {
  baseUrl: string;
  authorityHost: string;
  scope: string;
  httpTimeoutMs: number;
  tokenTtlMs: number;
  conflictMaxAttempts: number;
  conflictMinWaitMs: number;
  conflictMaxWaitMs: number;
  rateLimitMaxAttempts: number;
  rateLimitDefaultWaitMs: number;
  settleDelayMs: number;
  pollInitialDelayMs: number;
  pollIntervalMs: number;
  refreshHistoryTop: number;
  strictPayloads: boolean;
};

export type ServerConfig = {
  serverApiKey: string;
  host: string;
  port: number;
  mcpPath: string;
  healthPath: string;
};

export type ClientOptions = {
  config?: Partial<ClientConfig>;
  clock?: Partial<Clock>;
  adapter?: AxiosAdapter;
  exchange?: TokenExchange;
  /** Directory holding `schemas/` and `registry/`; defaults to the package root. */
  repoRoot?: string;
};

// ---- Refresh orchestration ------------------------------------------------------

export type RefreshStatus = "Pending" | "InProgress" | "Completed" | "Failed" | "Cancelled";

export type RefreshOptions = {
  force?: boolean;
  waitUntilComplete?: boolean;
  refreshType?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type WaitOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};
