import type { Account } from "./backends/types";
import { describeError } from "./errors";
import { detailLines, resourceLabel } from "./format";
import { accountKey, entryLabel } from "./grouping";
import type { LoadState, OrchestratorView } from "./orchestrator/types";

export interface RenderOptions {
  /** Include the revealed value pane. */
  showValue?: boolean;
  /** Prefix rows with their index so they can be picked by number. */
  numbered?: boolean;
}

function section<T>(
  title: string,
  state: LoadState<T[]>,
  selected: number,
  label: (item: T) => string,
  options: RenderOptions,
  items?: T[]
): string[] {
  const lines = [title];
  if (state.status === "idle") return [...lines, "  -"];
  if (state.status === "loading") return [...lines, "  Loading..."];
  if (state.status === "error") return [...lines, `  ⚠ ${describeError(state.error)}`];

  const rows = items ?? state.data;
  if (rows.length === 0) return [...lines, "  (none)"];
  rows.forEach((item, i) => {
    const marker = i === selected ? ">" : " ";
    const index = options.numbered ? `${String(i).padStart(2)} ` : "";
    lines.push(`${marker} ${index}${label(item)}`);
  });
  return lines;
}

/** Plain-text rendering of every pane, top to bottom, ending with the status line. */
export function renderView(view: OrchestratorView, options: RenderOptions = {}): string[] {
  const { selected } = view;
  const lines = [
    ...section("Accounts", view.accounts, selected.accounts, (a: Account) => accountKey(a), options),
    ...section("Subscriptions", view.subscriptions, selected.subscriptions, entryLabel, options),
    ...section("Resources", view.resources, selected.resources, resourceLabel, options),
    ...section(
      view.filter ? `Secrets (filter: ${view.filter})` : "Secrets",
      view.secrets,
      selected.secrets,
      (s) => s.name,
      options,
      view.visibleSecrets
    ),
  ];

  if (options.showValue) {
    lines.push("Value");
    const value = view.value;
    const resources = view.resources;
    if (value.status === "loading") {
      lines.push("  Loading...");
    } else if (value.status === "error") {
      lines.push(`  ⚠ ${describeError(value.error)}`);
    } else if (value.status === "loaded" && resources.status === "loaded") {
      const resource = resources.data[selected.resources];
      if (resource) {
        for (const line of detailLines(resource, value.data)) lines.push(`  ${line}`);
      }
    } else {
      lines.push("  -");
    }
  }

  if (view.status) lines.push("", view.status);
  return lines;
}
