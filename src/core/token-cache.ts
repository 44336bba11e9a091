import { acquireToken, formatAuthorization, isExpired } from "./credentials.js";
import type { Credential, Token, TokenExchange } from "./types.js";
import { logInfo, throwIfAborted } from "./utils.js";

export type TokenCacheOptions = {
  exchange: TokenExchange;
  scope: string;
  ttlMs: number;
  now?: () => number;
};

/**
 * Holds the last token issued for one credential. Concurrent callers that find
 * the token missing or expired share a single in-flight acquisition.
 */
export class TokenCache {
  private token: Token | null = null;

  private inflight: Promise<Token> | null = null;

  private acquisitions = 0;

  private readonly now: () => number;

  constructor(
    private readonly credential: Credential,
    private readonly options: TokenCacheOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  get credentialKind(): Credential["kind"] {
    return this.credential.kind;
  }

  /** Number of completed credential exchanges. */
  get acquisitionCount(): number {
    return this.acquisitions;
  }

  async getAuthorizationHeader(signal?: AbortSignal): Promise<string> {
    throwIfAborted(signal);
    const current = this.token;
    if (current && !isExpired(current, this.now())) return formatAuthorization(current);

    const token = await this.acquire();
    return formatAuthorization(token);
  }

  private acquire(): Promise<Token> {
    if (this.inflight) return this.inflight;

    const pending = acquireToken(this.credential, {
      exchange: this.options.exchange,
      scope: this.options.scope,
      ttlMs: this.options.ttlMs,
      now: this.now,
    })
      .then((token) => {
        this.token = token;
        this.acquisitions++;
        if (this.credential.kind === "servicePrincipal") {
          logInfo("pbi.token.acquired", {
            clientId: this.credential.clientId,
            ttlMs: token.ttlMs,
          });
        }
        return token;
      })
      .finally(() => {
        this.inflight = null;
      });

    this.inflight = pending;
    return pending;
  }
}
