import { createApp, type App } from "../app";
import { checkStatus } from "../backends/azure/cli";
import type { Account, ContainerAppResource, KeyVaultResource, Resource } from "../backends/types";
import { loadConfig } from "../config";
import { describeError } from "../errors";
import type { ResourceFetchers } from "../fetchers";

export interface TargetOptions {
  vault?: string;
  app?: string;
  resourceGroup?: string;
  subscription?: string;
  tenant?: string;
}

export function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

/** Load config, wire services, and make sure `az` is installed and signed in. */
export async function bootstrap(): Promise<App> {
  let app: App;
  try {
    app = createApp(await loadConfig());
  } catch (err) {
    fail(err instanceof Error ? err.message : String(err));
  }

  const status = await checkStatus(app.run);
  if (status === "not_installed") {
    fail(
      `Azure CLI not found (${app.config.azPath}). Run 'vaultnav setup' for installation instructions.`
    );
  }
  if (status === "not_logged_in") {
    fail("Azure CLI is not signed in. Run: az login");
  }
  return app;
}

function pickAccount(accounts: Account[], opts: TargetOptions): Account | undefined {
  if (opts.subscription) {
    const wanted = opts.subscription.toLowerCase();
    return accounts.find(
      (a) => a.id.toLowerCase() === wanted || a.name.toLowerCase() === wanted
    );
  }
  return accounts.find((a) => a.isDefault) ?? accounts[0];
}

/**
 * Turn `--vault` or `--app/--resource-group/--subscription` into a resource.
 * The tenant comes from `--tenant`, else from the matching subscription.
 */
export async function resolveTarget(
  fetchers: ResourceFetchers,
  opts: TargetOptions
): Promise<Resource> {
  if (opts.vault && opts.app) {
    throw new Error("Pass either --vault or --app, not both.");
  }
  if (!opts.vault && !opts.app) {
    throw new Error("Pass --vault <name> or --app <name>.");
  }

  const accounts = await fetchers.listAccounts();
  if (!accounts.ok) throw new Error(describeError(accounts.error));
  const account = pickAccount(accounts.value, opts);
  if (opts.subscription && !account) {
    throw new Error(`Subscription "${opts.subscription}" not found. Run: az account list`);
  }

  const tenantId = opts.tenant ?? account?.tenantId ?? "";
  const subscriptionId = account?.id ?? "";
  const resourceGroup = opts.resourceGroup ?? "";

  if (opts.vault) {
    const vault: KeyVaultResource = {
      kind: "keyvault",
      id: `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}/providers/Microsoft.KeyVault/vaults/${opts.vault}`,
      name: opts.vault,
      location: "",
      resourceGroup,
      subscriptionId,
      tenantId,
    };
    return vault;
  }

  if (!opts.resourceGroup || !opts.subscription) {
    throw new Error("--app needs --resource-group and --subscription.");
  }
  const app: ContainerAppResource = {
    kind: "containerapp",
    id: `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}/providers/Microsoft.App/containerApps/${opts.app ?? ""}`,
    name: opts.app ?? "",
    location: "",
    resourceGroup,
    subscriptionId,
    tenantId,
  };
  return app;
}
