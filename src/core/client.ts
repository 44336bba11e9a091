import { Catalog } from "./catalog.js";
import { createClientConfig, loadCredentialFromEnv, resolveRepoRoot } from "./config.js";
import { createClientCredentialsExchange, servicePrincipal, staticToken } from "./credentials.js";
import { AuthError } from "./errors.js";
import { loadRedactionFields } from "./policy.js";
import { RefreshOrchestrator } from "./refresh.js";
import { loadResourceDefinitions, PayloadValidator } from "./schema-validator.js";
import { HttpSession } from "./session.js";
import { TokenCache } from "./token-cache.js";
import type { ClientConfig, ClientOptions, Clock, Credential } from "./types.js";
import { sleep } from "./utils.js";

/** One open connection pool plus the operations that run over it. */
export class ApiSession {
  readonly catalog: Catalog;

  readonly refreshes: RefreshOrchestrator;

  constructor(
    readonly http: HttpSession,
    validator: PayloadValidator,
    clock: Clock,
  ) {
    this.catalog = new Catalog(http, validator);
    this.refreshes = new RefreshOrchestrator(http, this.catalog, http.config, clock);
  }

  close(): Promise<void> {
    return this.http.close();
  }
}

/**
 * Entry point for a tenant. Owns the credential and its token cache; sessions
 * opened from one client share the cached token.
 */
export class PowerBIClient {
  readonly config: ClientConfig;

  readonly tokens: TokenCache;

  private readonly clock: Clock;

  private readonly validator: PayloadValidator;

  readonly redactionFields: Set<string>;

  constructor(
    credential: Credential,
    private readonly options: ClientOptions = {},
  ) {
    this.config = createClientConfig(options.config);
    this.clock = {
      now: options.clock?.now ?? Date.now,
      sleep: options.clock?.sleep ?? sleep,
      random: options.clock?.random ?? Math.random,
    };

    const repoRoot = options.repoRoot ?? resolveRepoRoot(import.meta.url);
    this.validator = new PayloadValidator(loadResourceDefinitions(repoRoot), this.config.strictPayloads);
    this.redactionFields = loadRedactionFields(repoRoot);

    this.tokens = new TokenCache(credential, {
      exchange:
        options.exchange ??
        createClientCredentialsExchange(this.config.authorityHost, {
          adapter: options.adapter,
          timeoutMs: this.config.httpTimeoutMs,
        }),
      scope: this.config.scope,
      ttlMs: this.config.tokenTtlMs,
      now: this.clock.now,
    });
  }

  static withServicePrincipal(
    tenantId: string,
    clientId: string,
    clientSecret: string,
    options: ClientOptions = {},
  ): PowerBIClient {
    return new PowerBIClient(servicePrincipal(tenantId, clientId, clientSecret), options);
  }

  static withToken(token: string, options: ClientOptions = {}): PowerBIClient {
    return new PowerBIClient(staticToken(token), options);
  }

  static fromEnv(options: ClientOptions = {}): PowerBIClient {
    const credential = loadCredentialFromEnv();
    if (!credential) {
      throw new AuthError("No credentials configured. Set PBI_ACCESS_TOKEN or PBI_TENANT_ID/PBI_CLIENT_ID/PBI_CLIENT_SECRET.");
    }
    return new PowerBIClient(credential, options);
  }

  openSession(): ApiSession {
    const http = new HttpSession(this.tokens, this.config, {
      adapter: this.options.adapter,
      sleep: this.clock.sleep,
      random: this.clock.random,
      redactionFields: this.redactionFields,
    });
    return new ApiSession(http, this.validator, this.clock);
  }

  /** Runs `fn` against a fresh session and closes it afterwards, even on failure. */
  async withSession<T>(fn: (session: ApiSession) => Promise<T>): Promise<T> {
    const session = this.openSession();
    try {
      return await fn(session);
    } finally {
      await session.close();
    }
  }
}
