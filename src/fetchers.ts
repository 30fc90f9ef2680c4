import type {
  Account,
  CloudBackend,
  Resource,
  SecretMeta,
  SecretValue,
} from "./backends/types";
import {
  ACCOUNTS_KEY,
  resourcesKey,
  secretsKey,
  secretValueKey,
  secretValuePrefix,
} from "./cache/keys";
import type { TtlCache } from "./cache/ttl-cache";
import { classifyError, ResourceError } from "./errors";
import type { ChannelLogger } from "./logging";
import type { MutationResult, SecretMutation } from "./orchestrator/types";

export type FetchResult<T> =
  | { ok: true; value: T; cached: boolean }
  | { ok: false; error: ResourceError };

/**
 * Cache-aside reads over a backend. A hit is reported as `cached: true` so
 * callers can skip the loading indicator; a failure comes back as a value and
 * is never cached.
 */
export class ResourceFetchers {
  constructor(
    private readonly cache: TtlCache,
    private readonly backend: CloudBackend,
    private readonly log: ChannelLogger
  ) {}

  areAccountsCached(): boolean {
    return this.cache.has(ACCOUNTS_KEY);
  }

  listAccounts(): Promise<FetchResult<Account[]>> {
    return this.cacheAside(ACCOUNTS_KEY, () => this.backend.fetchAccounts());
  }

  areResourcesCached(subscriptionId: string): boolean {
    return this.cache.has(resourcesKey(subscriptionId));
  }

  listResources(subscription: Account): Promise<FetchResult<Resource[]>> {
    return this.cacheAside(resourcesKey(subscription.id), () =>
      this.backend.fetchResourceList(subscription)
    );
  }

  areSecretsCached(resource: Resource): boolean {
    return this.cache.has(secretsKey(resource));
  }

  listSecrets(resource: Resource): Promise<FetchResult<SecretMeta[]>> {
    return this.cacheAside(
      secretsKey(resource),
      () => this.backend.fetchSecretList(resource),
      (secrets, since) => {
        if (resource.kind !== "containerapp") return;
        for (const secret of secrets) {
          if (secret.value === undefined) continue;
          this.cache.setIfCurrent<SecretValue>(
            secretValueKey(resource, secret.name),
            { name: secret.name, value: secret.value },
            since
          );
        }
      }
    );
  }

  isSecretValueCached(resource: Resource, secretName: string): boolean {
    return this.cache.has(secretValueKey(resource, secretName));
  }

  cachedSecretValue(resource: Resource, secretName: string): SecretValue | undefined {
    return this.cache.get<SecretValue>(secretValueKey(resource, secretName));
  }

  async getSecretValue(
    resource: Resource,
    secretName: string
  ): Promise<FetchResult<SecretValue>> {
    if (resource.kind === "keyvault") {
      return this.cacheAside(secretValueKey(resource, secretName), () =>
        this.backend.fetchSecretValue(resource, secretName)
      );
    }

    // Container App values arrive with the listing; go through it on a miss.
    const hit = this.cachedSecretValue(resource, secretName);
    if (hit) return { ok: true, value: hit, cached: true };

    const listing = await this.listSecrets(resource);
    if (!listing.ok) return listing;
    const secret = listing.value.find((s) => s.name === secretName);
    if (!secret || secret.value === undefined) {
      return {
        ok: false,
        error: new ResourceError(
          "NotFound",
          `Secret "${secretName}" not found in Container App "${resource.name}"`
        ),
      };
    }
    return {
      ok: true,
      value: { name: secret.name, value: secret.value },
      cached: listing.cached,
    };
  }

  /**
   * Run a set/delete against the backend. On success the resource's listing
   * and value keys are dropped; a set then caches the value it wrote.
   */
  async applyMutation(mutation: SecretMutation): Promise<MutationResult> {
    const { resource, name } = mutation;
    try {
      if (mutation.type === "set") {
        await this.backend.setSecret(resource, name, mutation.value);
      } else {
        await this.backend.deleteSecret(resource, name);
      }
    } catch (err) {
      const error = classifyError(err);
      this.log.warn(`${mutation.type} failed`, {
        resource: resource.name,
        secret: name,
        kind: error.kind,
        error: error.message,
      });
      return { success: false, error };
    }

    this.invalidateSecrets(resource);
    if (mutation.type === "set") {
      this.rememberSecretValue(resource, { name, value: mutation.value });
    }
    this.log.info(`${mutation.type} applied`, { resource: resource.name, secret: name });
    return { success: true };
  }

  /** Store a value written locally so the next read is a hit. */
  rememberSecretValue(resource: Resource, value: SecretValue): void {
    this.cache.set(secretValueKey(resource, value.name), value);
  }

  invalidateSecrets(resource: Resource): void {
    this.cache.invalidate(secretsKey(resource));
    this.cache.invalidatePrefix(secretValuePrefix(resource));
  }

  invalidateResources(subscriptionId: string): void {
    this.cache.invalidate(resourcesKey(subscriptionId));
  }

  clear(): void {
    this.cache.clear();
  }

  /**
   * A load that started before an invalidation or `clear()` of its key still
   * returns its result to the caller but is not written back.
   */
  private async cacheAside<T>(
    key: string,
    load: () => Promise<T>,
    onStored?: (value: T, since: number) => void
  ): Promise<FetchResult<T>> {
    const hit = this.cache.get<T>(key);
    if (hit !== undefined) {
      this.log.debug("cache hit", { key });
      return { ok: true, value: hit, cached: true };
    }

    const since = this.cache.mark();
    let value: T;
    try {
      value = await load();
    } catch (err) {
      const error = classifyError(err);
      this.log.warn("fetch failed", { key, kind: error.kind, error: error.message });
      return { ok: false, error };
    }

    if (this.cache.setIfCurrent(key, value, since)) {
      this.log.debug("fetched", { key });
      onStored?.(value, since);
    } else {
      this.log.debug("fetched after eviction; not cached", { key });
    }
    return { ok: true, value, cached: false };
  }
}
