import type {
  Account,
  Resource,
  SecretMeta,
  SecretValue,
} from "../backends/types";
import type { ResourceError } from "../errors";
import type { SubscriptionEntry } from "../grouping";
import type { ProgressEvent } from "../loader";

export type LoadState<T> =
  | { status: "idle" }
  | { status: "loading" }
  | { status: "loaded"; data: T; cached: boolean }
  | { status: "error"; error: ResourceError };

export interface SelectedIndices {
  accounts: number;
  subscriptions: number;
  resources: number;
  secrets: number;
}

export interface OrchestratorView {
  accounts: LoadState<Account[]>;
  subscriptions: LoadState<SubscriptionEntry[]>;
  resources: LoadState<Resource[]>;
  /** Full listing of the selected resource, sorted by name. */
  secrets: LoadState<SecretMeta[]>;
  /** Listing after the filter; `selected.secrets` indexes into this. */
  visibleSecrets: SecretMeta[];
  filter: string;
  value: LoadState<SecretValue>;
  selected: SelectedIndices;
  status: string;
}

export interface SelectionContext {
  account?: Account;
  subscription?: SubscriptionEntry;
  resource?: Resource;
  secret?: SecretMeta;
}

export type OrchestratorEvent =
  | { type: "change" }
  | { type: "status"; message: string }
  | { type: "progress"; event: ProgressEvent };

export type OrchestratorListener = (event: OrchestratorEvent) => void;

export type SecretMutation =
  | { type: "set"; resource: Resource; name: string; value: string }
  | { type: "delete"; resource: Resource; name: string };

export type MutationResult =
  | { success: true }
  | { success: false; error: ResourceError };
