import axios, { type AxiosAdapter } from "axios";

import { AuthError } from "./errors.js";
import type {
  Credential,
  ServicePrincipalCredential,
  StaticTokenCredential,
  Token,
  TokenExchange,
  TokenExchangeRequest,
  TokenExchangeResponse,
} from "./types.js";
import { isPlainObject, toNonEmptyString } from "./utils.js";

export function servicePrincipal(tenantId: string, clientId: string, clientSecret: string): ServicePrincipalCredential {
  return {
    kind: "servicePrincipal",
    tenantId: toNonEmptyString(tenantId, "tenantId"),
    clientId: toNonEmptyString(clientId, "clientId"),
    clientSecret: toNonEmptyString(clientSecret, "clientSecret"),
  };
}

export function staticToken(value: string): StaticTokenCredential {
  return { kind: "staticToken", value: toNonEmptyString(value, "token") };
}

export function isExpired(token: Token, now: number): boolean {
  return now >= token.issuedAt + token.ttlMs;
}

export function formatAuthorization(token: Token): string {
  return `${token.scheme} ${token.accessToken}`;
}

/** OAuth2 client-credentials exchange against the Microsoft identity platform. */
export function createClientCredentialsExchange(
  authorityHost: string,
  options: { timeoutMs?: number; adapter?: AxiosAdapter } = {},
): TokenExchange {
  const http = axios.create({
    timeout: options.timeoutMs ?? 30_000,
    adapter: options.adapter,
    validateStatus: () => true,
  });

  return async (request: TokenExchangeRequest): Promise<TokenExchangeResponse> => {
    const body = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: request.clientId,
      client_secret: request.clientSecret,
      scope: request.scope,
    });

    const resp = await http.request<unknown>({
      method: "POST",
      url: `${authorityHost}/${encodeURIComponent(request.tenantId)}/oauth2/v2.0/token`,
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Accept: "application/json",
      },
      data: body.toString(),
    });

    const data = isPlainObject(resp.data) ? resp.data : {};
    return {
      access_token: typeof data.access_token === "string" ? data.access_token : undefined,
      expires_in: typeof data.expires_in === "number" || typeof data.expires_in === "string" ? data.expires_in : undefined,
      error: typeof data.error === "string" ? data.error : resp.status >= 400 ? `http_${resp.status}` : undefined,
      error_description: typeof data.error_description === "string" ? data.error_description : undefined,
    };
  };
}

/**
 * Produces a fresh token for the credential. Static tokens never expire; service
 * principal tokens live for `ttlMs`, shortened to the server's `expires_in`.
 */
export async function acquireToken(
  credential: Credential,
  ctx: { exchange: TokenExchange; scope: string; ttlMs: number; now: () => number },
): Promise<Token> {
  switch (credential.kind) {
    case "staticToken":
      return {
        accessToken: credential.value,
        issuedAt: ctx.now(),
        ttlMs: Number.POSITIVE_INFINITY,
        scheme: "Bearer",
      };
    case "servicePrincipal": {
      const issuedAt = ctx.now();
      let result: TokenExchangeResponse;
      try {
        result = await ctx.exchange({
          tenantId: credential.tenantId,
          clientId: credential.clientId,
          clientSecret: credential.clientSecret,
          scope: ctx.scope,
        });
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        throw new AuthError(`Failed to acquire token: ${message}`);
      }

      if (!result.access_token) {
        throw new AuthError(`Failed to acquire token: ${result.error_description || result.error || "Unknown error"}`, {
          error: result.error,
        });
      }

      const expiresInSeconds = Number(result.expires_in);
      const serverTtlMs = Number.isFinite(expiresInSeconds) && expiresInSeconds > 0 ? expiresInSeconds * 1000 : Number.POSITIVE_INFINITY;
      return {
        accessToken: result.access_token,
        issuedAt,
        ttlMs: Math.min(ctx.ttlMs, serverTtlMs),
        scheme: "Bearer",
      };
    }
  }
}
