import type { Token, TokenIssuer } from "../backends/types";
import { classifyError } from "../errors";
import type { ChannelLogger } from "../logging";

export const DEFAULT_REFRESH_MARGIN_MS = 5 * 60 * 1000;

export interface TokenCacheOptions {
  refreshMarginMs?: number;
  now?: () => number;
  logger: ChannelLogger;
}

/** `https://vault.azure.net/.default` → `https://vault.azure.net` */
export function scopeToResource(scope: string): string {
  return scope.endsWith("/.default") ? scope.slice(0, -"/.default".length) : scope;
}

/**
 * Bearer tokens per tenant. A token is handed out until it is within the
 * refresh margin of expiry. Issuance is serialized per tenant, so concurrent
 * callers for one tenant share a single `issueToken` call.
 */
export class TokenCache {
  private readonly tokens = new Map<string, Token>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly refreshMarginMs: number;
  private readonly now: () => number;
  private readonly log: ChannelLogger;
  private epoch = 0;

  constructor(
    private readonly issuer: TokenIssuer,
    options: TokenCacheOptions
  ) {
    this.refreshMarginMs = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS;
    this.now = options.now ?? Date.now;
    this.log = options.logger;
  }

  async getToken(tenantId: string, scope: string): Promise<Token> {
    const resource = scopeToResource(scope);
    const key = `${tenantId}|${resource}`;

    const cached = this.usable(key);
    if (cached) return cached;

    return this.withTenantLock(tenantId, async () => {
      // Another caller may have refreshed while we waited for the lock.
      const refreshed = this.usable(key);
      if (refreshed) return refreshed;

      const epoch = this.epoch;
      this.log.debug("issuing token", { tenantId, resource });
      let token: Token;
      try {
        token = await this.issuer.issueToken(tenantId, resource);
      } catch (err) {
        throw classifyError(err);
      }
      if (epoch === this.epoch) this.tokens.set(key, token);
      return token;
    });
  }

  clearCache(): void {
    this.epoch++;
    this.tokens.clear();
    this.log.debug("token cache cleared");
  }

  private usable(key: string): Token | undefined {
    const token = this.tokens.get(key);
    if (!token) return undefined;
    if (token.expiresOn - this.now() > this.refreshMarginMs) return token;
    this.tokens.delete(key);
    return undefined;
  }

  private withTenantLock<T>(tenantId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(tenantId) ?? Promise.resolve();
    const run = previous.then(task);
    const released = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(tenantId, released);
    void released.then(() => {
      if (this.locks.get(tenantId) === released) this.locks.delete(tenantId);
    });
    return run;
  }
}
