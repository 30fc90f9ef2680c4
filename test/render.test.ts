import { describe, test, expect } from "vitest";
import { ResourceError } from "../src/errors";
import type { OrchestratorView } from "../src/orchestrator/types";
import { renderView } from "../src/render";
import { account, keyVault } from "./helpers/fake-backend";

function emptyView(): OrchestratorView {
  return {
    accounts: { status: "idle" },
    subscriptions: { status: "idle" },
    resources: { status: "idle" },
    secrets: { status: "idle" },
    visibleSecrets: [],
    filter: "",
    value: { status: "idle" },
    selected: { accounts: -1, subscriptions: -1, resources: -1, secrets: -1 },
    status: "",
  };
}

describe("renderView", () => {
  test("shows loading and idle panes", () => {
    const view = emptyView();
    view.accounts = {
      status: "loaded",
      data: [account({ id: "s1", name: "one" })],
      cached: false,
    };
    view.selected.accounts = 0;
    view.subscriptions = { status: "loading" };
    view.status = "Loading...";

    expect(renderView(view)).toEqual([
      "Accounts",
      "> dev@example.com",
      "Subscriptions",
      "  Loading...",
      "Resources",
      "  -",
      "Secrets",
      "  -",
      "",
      "Loading...",
    ]);
  });

  test("shows errors in place and numbers rows on request", () => {
    const view = emptyView();
    view.accounts = {
      status: "loaded",
      data: [
        account({ id: "s1", name: "one" }),
        account({ id: "s2", name: "two", user: { name: "ops@example.com", type: "user" } }),
      ],
      cached: true,
    };
    view.selected.accounts = 1;
    view.resources = { status: "error", error: new ResourceError("AccessDenied", "denied") };

    expect(renderView(view, { numbered: true }).slice(0, 7)).toEqual([
      "Accounts",
      "   0 dev@example.com",
      ">  1 ops@example.com",
      "Subscriptions",
      "  -",
      "Resources",
      "  ⚠ Access denied: denied",
    ]);
  });

  test("shows the filtered list and the revealed value", () => {
    const view = emptyView();
    view.resources = { status: "loaded", data: [keyVault("kv")], cached: false };
    view.selected.resources = 0;
    view.secrets = { status: "loaded", data: [{ name: "a" }, { name: "b" }], cached: false };
    view.visibleSecrets = [{ name: "b" }];
    view.filter = "b";
    view.selected.secrets = 0;
    view.value = { status: "loaded", data: { name: "b", value: "test-secret" }, cached: true };

    expect(renderView(view, { showValue: true }).slice(4)).toEqual([
      "Resources",
      "> [kv] kv",
      "Secrets (filter: b)",
      "> b",
      "Value",
      "  Name: b",
      "  Value: test-secret",
      "  Created: -",
      "  Updated: -",
      "  Expires: Never",
      "  Enabled: No",
    ]);
  });

  test("an empty listing says so", () => {
    const view = emptyView();
    view.secrets = { status: "loaded", data: [], cached: false };
    expect(renderView(view).slice(6, 8)).toEqual(["Secrets", "  (none)"]);
  });
});
