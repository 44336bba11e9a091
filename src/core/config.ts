import path from "node:path";
import { fileURLToPath } from "node:url";

import { httpError } from "./errors.js";
import type { ClientConfig, Credential, ServerConfig } from "./types.js";
import { clamp, readBoolEnv, readIntEnv, readStringEnv } from "./utils.js";

export const DEFAULT_BASE_URL = "https://api.powerbi.com/v1.0/myorg";
export const DEFAULT_AUTHORITY_HOST = "https://login.microsoftonline.com";
export const DEFAULT_SCOPE = "https://analysis.windows.net/powerbi/api/.default";

export function resolveRepoRoot(importMetaUrl: string): string {
  const here = path.dirname(fileURLToPath(importMetaUrl));
  return path.resolve(here, "..", "..");
}

export function createClientConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  const conflictMinWaitMs = readIntEnv("PBI_CONFLICT_MIN_WAIT_MS", 10_000, 0, 600_000);
  const conflictMaxWaitMs = clamp(readIntEnv("PBI_CONFLICT_MAX_WAIT_MS", 20_000, 0, 600_000), conflictMinWaitMs, 600_000);

  const base: ClientConfig = {
    baseUrl: readStringEnv("PBI_BASE_URL", DEFAULT_BASE_URL).replace(/\/+$/, ""),
    authorityHost: readStringEnv("PBI_AUTHORITY_HOST", DEFAULT_AUTHORITY_HOST).replace(/\/+$/, ""),
    scope: readStringEnv("PBI_SCOPE", DEFAULT_SCOPE),
    httpTimeoutMs: readIntEnv("PBI_HTTP_TIMEOUT_MS", 600_000, 1_000, 3_600_000),
    tokenTtlMs: readIntEnv("PBI_TOKEN_TTL_MS", 1_200_000, 60_000, 86_400_000),
    conflictMaxAttempts: readIntEnv("PBI_CONFLICT_MAX_ATTEMPTS", 5, 1, 20),
    conflictMinWaitMs,
    conflictMaxWaitMs,
    rateLimitMaxAttempts: readIntEnv("PBI_RATE_LIMIT_MAX_ATTEMPTS", 10, 1, 50),
    rateLimitDefaultWaitMs: readIntEnv("PBI_RATE_LIMIT_DEFAULT_WAIT_MS", 60_000, 0, 3_600_000),
    settleDelayMs: readIntEnv("PBI_SETTLE_DELAY_MS", 5_000, 0, 600_000),
    pollInitialDelayMs: readIntEnv("PBI_POLL_INITIAL_DELAY_MS", 10_000, 0, 600_000),
    pollIntervalMs: readIntEnv("PBI_POLL_INTERVAL_MS", 10_000, 100, 3_600_000),
    refreshHistoryTop: readIntEnv("PBI_REFRESH_HISTORY_TOP", 50, 1, 1_000),
    strictPayloads: readBoolEnv("PBI_STRICT_PAYLOADS", false),
  };

  return {
    ...base,
    ...overrides,
  };
}

export function createServerConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  const base: ServerConfig = {
    serverApiKey: process.env.SERVER_API_KEY || "",
    host: process.env.HOST || "127.0.0.1",
    port: readIntEnv("PORT", 8787, 1, 65535),
    mcpPath: process.env.MCP_PATH || "/mcp",
    healthPath: process.env.HEALTH_PATH || "/healthz",
  };

  return {
    ...base,
    ...overrides,
  };
}

export function loadCredentialFromEnv(): Credential | null {
  const tenantId = process.env.PBI_TENANT_ID;
  const clientId = process.env.PBI_CLIENT_ID;
  const clientSecret = process.env.PBI_CLIENT_SECRET;
  const accessToken = process.env.PBI_ACCESS_TOKEN;

  const principalUnset = !tenantId && !clientId && !clientSecret;
  if (principalUnset) {
    return accessToken ? { kind: "staticToken", value: accessToken.trim() } : null;
  }

  if (!tenantId || !clientId || !clientSecret) {
    throw httpError(
      500,
      "Service principal credentials are partially configured. Set PBI_TENANT_ID, PBI_CLIENT_ID, PBI_CLIENT_SECRET together.",
    );
  }
  if (accessToken) {
    throw httpError(500, "Set either PBI_ACCESS_TOKEN or the PBI_TENANT_ID/PBI_CLIENT_ID/PBI_CLIENT_SECRET trio, not both.");
  }

  return {
    kind: "servicePrincipal",
    tenantId: tenantId.trim(),
    clientId: clientId.trim(),
    clientSecret,
  };
}
