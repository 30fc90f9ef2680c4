import type { Account, Resource, SecretMeta } from "../backends/types";
import { describeError } from "../errors";
import type { FetchResult, ResourceFetchers } from "../fetchers";
import {
  accountKey,
  buildSubscriptionEntries,
  subscriptionsForAccount,
  uniqueAccounts,
  type SubscriptionEntry,
} from "../grouping";
import { bulkLoad, DEFAULT_CONCURRENCY, runBulkLoad } from "../loader";
import type { ChannelLogger } from "../logging";
import { LEVELS, SelectionGuard, type Level, type LoadToken } from "./guard";
import type {
  MutationResult,
  OrchestratorEvent,
  OrchestratorListener,
  OrchestratorView,
  SecretMutation,
  SelectedIndices,
  SelectionContext,
} from "./types";

export interface OrchestratorOptions {
  fetchers: ResourceFetchers;
  /** Dropped together with the data cache on a forced refresh. */
  tokenCache?: { clearCache(): void };
  concurrency?: number;
  logger: ChannelLogger;
  /** Bulk loads log here; defaults to `logger`. */
  loaderLogger?: ChannelLogger;
}

type IndexPicker = (count: number) => number;

const NONE: SelectedIndices = {
  accounts: -1,
  subscriptions: -1,
  resources: -1,
  secrets: -1,
};

function inBounds(index: number | undefined, count: number): index is number {
  return index !== undefined && index >= 0 && index < count;
}

function sortResources(resources: Resource[]): Resource[] {
  return resources.slice().sort((a, b) => {
    if (a.kind !== b.kind) return a.kind === "keyvault" ? -1 : 1;
    return a.name.localeCompare(b.name);
  });
}

function sortSecrets(secrets: SecretMeta[]): SecretMeta[] {
  return secrets.slice().sort((a, b) => a.name.localeCompare(b.name));
}

function resourceSummary(resources: Resource[]): string {
  const vaults = resources.filter((r) => r.kind === "keyvault").length;
  return `${vaults} key vaults + ${resources.length - vaults} container apps`;
}

/**
 * Cascading selection controller: account → subscription (or group) →
 * resource → secret → value.
 *
 * Every async completion goes through `applyIfCurrent`, so a result computed
 * for a selection the user has already left is dropped instead of overwriting
 * the view that replaced it.
 */
export class Orchestrator {
  private readonly fetchers: ResourceFetchers;
  private readonly tokenCache?: { clearCache(): void };
  private readonly concurrency: number;
  private readonly log: ChannelLogger;
  private readonly loaderLog: ChannelLogger;
  private readonly guard = new SelectionGuard();
  private readonly listeners = new Set<OrchestratorListener>();

  private allAccounts: Account[] = [];
  private warmupController?: AbortController;
  private warmup: Promise<void> = Promise.resolve();

  readonly view: OrchestratorView = {
    accounts: { status: "idle" },
    subscriptions: { status: "idle" },
    resources: { status: "idle" },
    secrets: { status: "idle" },
    visibleSecrets: [],
    filter: "",
    value: { status: "idle" },
    selected: { ...NONE },
    status: "",
  };

  constructor(options: OrchestratorOptions) {
    this.fetchers = options.fetchers;
    this.tokenCache = options.tokenCache;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.log = options.logger;
    this.loaderLog = options.loaderLogger ?? options.logger;
  }

  subscribe(listener: OrchestratorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  selection(): SelectionContext {
    return {
      account: this.selectedAccount(),
      subscription: this.selectedEntry(),
      resource: this.selectedResource(),
      secret: this.selectedSecret(),
    };
  }

  /**
   * Apply an async result only while `token` is current. Returns whether it
   * was applied; listeners hear about it if so.
   */
  applyIfCurrent(token: LoadToken, apply: () => void): boolean {
    const applied = this.guard.applyIfCurrent(token, apply);
    if (applied) this.emit({ type: "change" });
    else this.log.debug("discarded stale result", { ...token });
    return applied;
  }

  /** Resolves once the background resource warm-up for the account settles. */
  whenWarm(): Promise<void> {
    return this.warmup;
  }

  dispose(): void {
    this.warmupController?.abort();
    this.listeners.clear();
  }

  /**
   * Reload from the accounts level down, restoring the previous selection
   * wherever its index is still in range. `force` drops every cache first.
   */
  async refresh(options: { force?: boolean } = {}): Promise<void> {
    const saved = { ...this.view.selected };

    if (options.force) {
      this.fetchers.clear();
      this.tokenCache?.clearCache();
      this.log.info("caches cleared for forced refresh");
    }

    const token = this.guard.advance("accounts");
    this.clearFrom("subscriptions");
    this.view.selected = { ...NONE };
    if (!this.fetchers.areAccountsCached()) {
      this.view.accounts = { status: "loading" };
    }
    this.setStatus("Refreshing all data...");

    const result = await this.fetchers.listAccounts();

    let accounts: Account[] = [];
    const applied = this.applyIfCurrent(token, () => {
      if (!result.ok) {
        this.view.accounts = { status: "error", error: result.error };
        this.setStatus(describeError(result.error));
        return;
      }
      this.allAccounts = result.value;
      accounts = uniqueAccounts(result.value);
      this.view.accounts = { status: "loaded", data: accounts, cached: result.cached };
      this.setStatus(`Refreshed ${accounts.length} accounts`);
    });
    if (!applied || accounts.length === 0) return;

    const index = inBounds(saved.accounts, accounts.length) ? saved.accounts : 0;
    await this.selectAccountWith(index, saved);
  }

  selectAccount(index: number): Promise<void> {
    return this.selectAccountWith(index);
  }

  selectSubscription(index: number): Promise<void> {
    return this.selectSubscriptionWith(index);
  }

  selectResource(index: number): Promise<void> {
    return this.loadSecrets(index, () => 0);
  }

  async selectSecret(index: number): Promise<void> {
    const visible = this.view.visibleSecrets;
    const resource = this.selectedResource();
    if (!resource || !inBounds(index, visible.length)) return;

    this.view.selected.secrets = index;
    const token = this.guard.advance("value");
    const secret = visible[index];

    const hit = this.fetchers.cachedSecretValue(resource, secret.name);
    if (hit) {
      this.view.value = {
        status: "loaded",
        data: { ...hit, attributes: hit.attributes ?? secret.attributes },
        cached: true,
      };
      this.setStatus("Secret loaded (cached)");
      this.emit({ type: "change" });
      return;
    }

    this.view.value = { status: "loading" };
    this.setStatus("Fetching secret value...");
    this.emit({ type: "change" });

    const result = await this.fetchers.getSecretValue(resource, secret.name);
    this.applyIfCurrent(token, () => {
      if (result.ok) {
        this.view.value = {
          status: "loaded",
          data: { ...result.value, attributes: result.value.attributes ?? secret.attributes },
          cached: result.cached,
        };
        this.setStatus("Secret loaded");
      } else {
        this.view.value = { status: "error", error: result.error };
        this.setStatus(`Failed to fetch secret: ${describeError(result.error)}`);
      }
    });
  }

  /**
   * Filter the secret list by case-insensitive substring. The selection stays
   * on the same secret when it survives the filter.
   */
  async setFilter(text: string): Promise<void> {
    this.view.filter = text;
    if (this.view.secrets.status !== "loaded") return;

    const previous = this.selectedSecret();
    this.view.visibleSecrets = this.applyFilter(this.view.secrets.data);

    const kept = previous
      ? this.view.visibleSecrets.findIndex((s) => s.name === previous.name)
      : -1;
    if (kept >= 0) {
      this.view.selected.secrets = kept;
      this.emit({ type: "change" });
      return;
    }
    if (this.view.visibleSecrets.length > 0) {
      await this.selectSecret(0);
      return;
    }
    this.guard.advance("value");
    this.view.selected.secrets = -1;
    this.view.value = { status: "idle" };
    this.emit({ type: "change" });
  }

  /**
   * Run a set/delete. On success the affected caches are dropped and, if the
   * resource is still on screen, its listing is reloaded with the selection on
   * the touched secret.
   */
  async execute(mutation: SecretMutation): Promise<MutationResult> {
    const existed =
      this.view.secrets.status === "loaded" &&
      this.view.secrets.data.some((s) => s.name === mutation.name);
    this.setStatus(mutation.type === "delete" ? "Deleting..." : existed ? "Updating..." : "Creating...");

    const result = await this.fetchers.applyMutation(mutation);
    if (!result.success) {
      this.setStatus(`Failed: ${result.error.message}`);
      return result;
    }

    const current = this.selectedResource();
    if (current && current.id === mutation.resource.id) {
      const previousIndex = this.view.selected.secrets;
      await this.loadSecrets(this.view.selected.resources, (count) => {
        const named = this.view.visibleSecrets.findIndex((s) => s.name === mutation.name);
        if (named >= 0) return named;
        return Math.min(Math.max(previousIndex, 0), count - 1);
      });
    }

    this.setStatus(mutation.type === "delete" ? "Deleted" : existed ? "Updated" : "Created");
    return result;
  }

  /** Drop the selected subscription's (or group's) resource lists and load them again. */
  async reloadResources(): Promise<void> {
    if (this.view.subscriptions.status !== "loaded") return;
    const index = this.view.selected.subscriptions;
    const entries = this.view.subscriptions.data;
    if (!inBounds(index, entries.length)) return;

    const entry = entries[index];
    const members = entry.type === "group" ? entry.members : [entry.subscription];
    for (const member of members) this.fetchers.invalidateResources(member.id);
    this.log.info("resource lists invalidated", { subscriptions: members.map((m) => m.id) });
    await this.selectSubscriptionWith(index);
  }

  private async selectAccountWith(index: number, restore?: SelectedIndices): Promise<void> {
    if (this.view.accounts.status !== "loaded") return;
    const accounts = this.view.accounts.data;
    if (!inBounds(index, accounts.length)) return;

    this.view.selected = { ...NONE, accounts: index };
    this.guard.advance("subscriptions");
    this.clearFrom("subscriptions");

    const account = accounts[index];
    const subscriptions = subscriptionsForAccount(this.allAccounts, accountKey(account));
    const entries = buildSubscriptionEntries(subscriptions);
    this.view.subscriptions = { status: "loaded", data: entries, cached: true };
    this.setStatus(`Found ${subscriptions.length} subscriptions for ${accountKey(account)}`);
    this.emit({ type: "change" });

    this.startWarmup(subscriptions);

    const first = entries.findIndex((e) => e.type === "subscription");
    const wanted = restore?.subscriptions;
    const pick = inBounds(wanted, entries.length) ? wanted : first;
    if (pick >= 0) await this.selectSubscriptionWith(pick, restore);
  }

  private async selectSubscriptionWith(index: number, restore?: SelectedIndices): Promise<void> {
    if (this.view.subscriptions.status !== "loaded") return;
    const entries = this.view.subscriptions.data;
    if (!inBounds(index, entries.length)) return;

    this.view.selected = { ...this.view.selected, subscriptions: index, resources: -1, secrets: -1 };
    const token = this.guard.advance("resources");
    this.clearFrom("resources");

    const entry = entries[index];
    const members = entry.type === "group" ? entry.members : [entry.subscription];
    const label = entry.type === "group" ? `${members.length} subscriptions` : entry.subscription.name;

    if (!members.every((m) => this.fetchers.areResourcesCached(m.id))) {
      this.view.resources = { status: "loading" };
      this.setStatus(`Loading resources for ${label}...`);
    }
    this.emit({ type: "change" });

    const results = entry.type === "group"
      ? await this.loadGroup(token, members)
      : [await this.fetchers.listResources(entry.subscription)];

    let loaded: Resource[] = [];
    const applied = this.applyIfCurrent(token, () => {
      const failures = results.flatMap((r) => (r.ok ? [] : [r.error]));
      if (failures.length === results.length) {
        this.view.resources = { status: "error", error: failures[0] };
        this.setStatus(describeError(failures[0]));
        return;
      }
      loaded = sortResources(results.flatMap((r) => (r.ok ? r.value : [])));
      const cached = results.every((r) => r.ok && r.cached);
      this.view.resources = { status: "loaded", data: loaded, cached };

      let message = `Found ${resourceSummary(loaded)}`;
      if (entry.type === "group") message += ` across ${members.length} subscriptions`;
      if (failures.length > 0) message += ` (${failures.length} failed)`;
      if (cached) message += " (cached)";
      this.setStatus(message);
    });
    if (!applied || loaded.length === 0) return;

    const wanted = restore?.resources;
    const pick = inBounds(wanted, loaded.length) ? wanted : 0;
    const restoreSecret = restore?.secrets;
    await this.loadSecrets(pick, (count) => (inBounds(restoreSecret, count) ? restoreSecret : 0));
  }

  /** Fan a group out over the bulk loader and collect one result per member. */
  private async loadGroup(
    token: LoadToken,
    members: Account[]
  ): Promise<FetchResult<Resource[]>[]> {
    const byId = new Map(members.map((m) => [m.id, m]));
    const results = new Map<string, FetchResult<Resource[]>>();

    const events = bulkLoad(byId.keys(), {
      isCached: (id) => this.fetchers.areResourcesCached(id),
      fetch: async (id) => {
        const member = byId.get(id);
        if (member) results.set(id, await this.fetchers.listResources(member));
      },
      concurrency: this.concurrency,
      logger: this.loaderLog,
    });
    await runBulkLoad(events, (event) => {
      if (this.guard.isCurrent(token)) this.emit({ type: "progress", event });
    });

    const collected: FetchResult<Resource[]>[] = [];
    for (const member of members) {
      collected.push(results.get(member.id) ?? (await this.fetchers.listResources(member)));
    }
    return collected;
  }

  private async loadSecrets(index: number, pickSecret: IndexPicker): Promise<void> {
    if (this.view.resources.status !== "loaded") return;
    const resources = this.view.resources.data;
    if (!inBounds(index, resources.length)) return;

    this.view.selected = { ...this.view.selected, resources: index, secrets: -1 };
    const token = this.guard.advance("secrets");
    this.clearFrom("secrets");

    const resource = resources[index];
    if (!this.fetchers.areSecretsCached(resource)) {
      this.view.secrets = { status: "loading" };
      this.setStatus(`Loading secrets from ${resource.name}...`);
    }
    this.emit({ type: "change" });

    const result = await this.fetchers.listSecrets(resource);

    const applied = this.applyIfCurrent(token, () => {
      if (!result.ok) {
        this.view.secrets = { status: "error", error: result.error };
        this.setStatus("⚠ Failed to load secrets");
        return;
      }
      const secrets = sortSecrets(result.value);
      this.view.secrets = { status: "loaded", data: secrets, cached: result.cached };
      this.view.visibleSecrets = this.applyFilter(secrets);
      this.setStatus(`Found ${secrets.length} secrets${result.cached ? " (cached)" : ""}`);
    });
    if (!applied || this.view.visibleSecrets.length === 0) return;

    const pick = pickSecret(this.view.visibleSecrets.length);
    if (inBounds(pick, this.view.visibleSecrets.length)) await this.selectSecret(pick);
  }

  /** Warm the resource cache for every subscription of the account. */
  private startWarmup(subscriptions: Account[]): void {
    this.warmupController?.abort();
    const controller = new AbortController();
    this.warmupController = controller;

    const byId = new Map(subscriptions.map((s) => [s.id, s]));
    const events = bulkLoad(byId.keys(), {
      isCached: (id) => this.fetchers.areResourcesCached(id),
      fetch: (id) => {
        const sub = byId.get(id);
        return sub ? this.fetchers.listResources(sub) : Promise.resolve();
      },
      concurrency: this.concurrency,
      signal: controller.signal,
      logger: this.loaderLog,
    });

    this.warmup = runBulkLoad(events, (event) => {
      if (controller !== this.warmupController) return;
      this.emit({ type: "progress", event });
      if (event.total > 0 && this.view.resources.status === "loading") {
        const name = (event.currentId && byId.get(event.currentId)?.name) || event.currentId || "";
        this.setStatus(`Loading resources (${event.completed}/${event.total}): ${name.slice(0, 30)}...`);
      }
    }).catch((err: unknown) => {
      this.log.error("resource warm-up failed", {
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }

  private applyFilter(secrets: SecretMeta[]): SecretMeta[] {
    const filter = this.view.filter.trim().toLowerCase();
    if (!filter) return secrets.slice();
    return secrets.filter((s) => s.name.toLowerCase().includes(filter));
  }

  /** Reset `level` and every level below it. */
  private clearFrom(level: Exclude<Level, "accounts">): void {
    const depth = LEVELS.indexOf(level);
    if (depth <= LEVELS.indexOf("subscriptions")) {
      this.view.subscriptions = { status: "idle" };
      this.warmupController?.abort();
    }
    if (depth <= LEVELS.indexOf("resources")) {
      this.view.resources = { status: "idle" };
    }
    if (depth <= LEVELS.indexOf("secrets")) {
      this.view.secrets = { status: "idle" };
      this.view.visibleSecrets = [];
    }
    this.view.value = { status: "idle" };
  }

  private selectedAccount(): Account | undefined {
    const state = this.view.accounts;
    return state.status === "loaded" ? state.data[this.view.selected.accounts] : undefined;
  }

  private selectedEntry(): SubscriptionEntry | undefined {
    const state = this.view.subscriptions;
    return state.status === "loaded" ? state.data[this.view.selected.subscriptions] : undefined;
  }

  private selectedResource(): Resource | undefined {
    const state = this.view.resources;
    return state.status === "loaded" ? state.data[this.view.selected.resources] : undefined;
  }

  private selectedSecret(): SecretMeta | undefined {
    return this.view.visibleSecrets[this.view.selected.secrets];
  }

  private setStatus(message: string): void {
    this.view.status = message;
    this.emit({ type: "status", message });
  }

  private emit(event: OrchestratorEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
