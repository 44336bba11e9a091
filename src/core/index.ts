export { ApiSession, PowerBIClient } from "./client.js";
export { Catalog, normalizeColumnName } from "./catalog.js";
export type { ScheduleUpdate } from "./catalog.js";
export {
  createClientConfig,
  createServerConfig,
  DEFAULT_AUTHORITY_HOST,
  DEFAULT_BASE_URL,
  DEFAULT_SCOPE,
  loadCredentialFromEnv,
} from "./config.js";
export { createClientCredentialsExchange, servicePrincipal, staticToken } from "./credentials.js";
export {
  AbortedError,
  AuthError,
  ConflictError,
  describeError,
  HttpError,
  NotFoundError,
  RateLimitError,
  ValidationError,
} from "./errors.js";
export { RefreshOrchestrator } from "./refresh.js";
export type { CancelOutcome, RefreshOutcome } from "./refresh.js";
export { isInProgress, latestRecord, normalizeRefreshStatus, toRow, toRows } from "./resources.js";
export type {
  Dataflow,
  Dataset,
  Group,
  Page,
  Refresh,
  RefreshRecord,
  Refreshable,
  Report,
  Resource,
  Row,
  Schedule,
  Transaction,
} from "./resources.js";
export { conflictPolicy, rateLimitPolicy, runWithRetry } from "./retry.js";
export type { RetryPolicy } from "./retry.js";
export { HttpSession } from "./session.js";
export { TokenCache } from "./token-cache.js";
export type {
  ClientConfig,
  ClientOptions,
  Clock,
  Credential,
  RefreshOptions,
  RefreshStatus,
  ServerConfig,
  WaitOptions,
} from "./types.js";
export { setLogLevel } from "./utils.js";
