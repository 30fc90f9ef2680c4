import type { Account } from "./backends/types";

const ENV_PATTERNS = [
  "dev",
  "tst",
  "test",
  "stg",
  "stage",
  "staging",
  "prd",
  "prod",
  "production",
  "sub",
  "liv",
  "live",
];

/**
 * Strip environment markers from a subscription name so that e.g.
 * `dev-payments`, `payments-prd` and `sub-payments-stg` share `payments`.
 */
export function subscriptionBaseName(name: string): string {
  let result = name.toLowerCase();

  for (const env of ENV_PATTERNS) {
    if (result.startsWith(`${env}-`)) {
      result = result.slice(env.length + 1);
    }
    if (result.endsWith(`-${env}`)) {
      result = result.slice(0, -(env.length + 1));
    }
    result = result.split(`-${env}-`).join("-");
  }

  while (result.includes("--")) {
    result = result.replace(/--/g, "-");
  }
  return result.replace(/^-+|-+$/g, "");
}

export type SubscriptionEntry =
  | { type: "group"; baseName: string; members: Account[] }
  | { type: "subscription"; subscription: Account; grouped: boolean };

/** Key an account row belongs to on the account level. */
export function accountKey(account: Account): string {
  return account.user?.name ?? account.tenantId;
}

/** One row per signed-in user (or tenant, when the CLI reports no user). */
export function uniqueAccounts(accounts: Account[]): Account[] {
  const seen = new Map<string, Account>();
  for (const account of accounts) {
    const key = accountKey(account);
    if (!seen.has(key)) seen.set(key, account);
  }
  return [...seen.values()];
}

export function subscriptionsForAccount(accounts: Account[], key: string): Account[] {
  return accounts
    .filter((a) => accountKey(a) === key)
    .sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Flatten subscriptions into list entries ordered by base name. A base name
 * with several subscriptions gets a group header followed by its members.
 */
export function buildSubscriptionEntries(subscriptions: Account[]): SubscriptionEntry[] {
  const groups = new Map<string, Account[]>();
  for (const sub of subscriptions) {
    const base = subscriptionBaseName(sub.name);
    const members = groups.get(base);
    if (members) members.push(sub);
    else groups.set(base, [sub]);
  }

  const entries: SubscriptionEntry[] = [];
  const bases = [...groups.keys()].sort((a, b) => a.localeCompare(b));
  for (const baseName of bases) {
    const members = (groups.get(baseName) ?? [])
      .slice()
      .sort((a, b) => a.name.localeCompare(b.name));
    if (members.length > 1) {
      entries.push({ type: "group", baseName, members });
      for (const subscription of members) {
        entries.push({ type: "subscription", subscription, grouped: true });
      }
    } else {
      for (const subscription of members) {
        entries.push({ type: "subscription", subscription, grouped: false });
      }
    }
  }
  return entries;
}

export function entryLabel(entry: SubscriptionEntry): string {
  if (entry.type === "group") return `${entry.baseName}:`;
  return entry.grouped ? `  ${entry.subscription.name}` : entry.subscription.name;
}
