import type { Dispatcher } from "undici";
import type { z } from "zod";
import type { ChannelLogger } from "../../logging";
import type {
  Account,
  CloudBackend,
  CommandRunner,
  ContainerAppResource,
  KeyVaultResource,
  Resource,
  SecretAttributes,
  SecretMeta,
  SecretValue,
} from "../types";
import { exec, execJson } from "./cli";
import { AzureRestClient, type TokenSource } from "./rest";
import {
  AccountListSchema,
  ArmResourceSchema,
  ContainerAppSecretListSchema,
  pageOf,
  VaultSecretBundleSchema,
  VaultSecretItemSchema,
} from "./schemas";

export const ARM_SCOPE = "https://management.azure.com/.default";
export const VAULT_SCOPE = "https://vault.azure.net/.default";

const KEYVAULT_API = "2023-07-01";
const CONTAINERAPPS_API = "2024-03-01";
const VAULT_DATA_API = "7.4";

export interface AzureBackendOptions {
  run: CommandRunner;
  tokens: TokenSource;
  armEndpoint: string;
  vaultDnsSuffix: string;
  dispatcher?: Dispatcher;
  logger: ChannelLogger;
}

/** `/subscriptions/s/resourceGroups/rg/providers/...` → `rg` */
export function resourceGroupOf(id: string): string {
  const match = /\/resourceGroups\/([^/]+)/i.exec(id);
  return match ? match[1] : "";
}

/** Secret name from a Key Vault secret id (`.../secrets/<name>[/<version>]`). */
export function secretNameOf(id: string): string {
  const match = /\/secrets\/([^/?]+)/.exec(id);
  return match ? decodeURIComponent(match[1]) : id;
}

function isoFromSeconds(seconds: number | undefined): string | undefined {
  return seconds === undefined ? undefined : new Date(seconds * 1000).toISOString();
}

type VaultAttributes = z.infer<typeof VaultSecretItemSchema>["attributes"];

function toAttributes(attrs: VaultAttributes): SecretAttributes | undefined {
  if (!attrs) return undefined;
  return {
    enabled: attrs.enabled,
    created: isoFromSeconds(attrs.created),
    updated: isoFromSeconds(attrs.updated),
    expires: isoFromSeconds(attrs.exp),
    notBefore: isoFromSeconds(attrs.nbf),
  };
}

/**
 * Key Vault and Container App secrets in Azure. Subscriptions come from the
 * `az` CLI session; listings and Key Vault reads go over REST with CLI-issued
 * tokens; Container App writes go through `az containerapp secret`, which
 * merges a single secret server-side.
 */
export class AzureBackend implements CloudBackend {
  readonly name = "Azure";

  private readonly run: CommandRunner;
  private readonly rest: AzureRestClient;
  private readonly armEndpoint: string;
  private readonly vaultDnsSuffix: string;
  private readonly log: ChannelLogger;

  constructor(options: AzureBackendOptions) {
    this.run = options.run;
    this.rest = new AzureRestClient(options.tokens, {
      dispatcher: options.dispatcher,
      logger: options.logger,
    });
    this.armEndpoint = options.armEndpoint.replace(/\/+$/, "");
    this.vaultDnsSuffix = options.vaultDnsSuffix;
    this.log = options.logger;
  }

  async fetchAccounts(): Promise<Account[]> {
    const rows = await execJson(this.run, ["account", "list", "--all"], AccountListSchema);
    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      isDefault: row.isDefault,
      state: row.state,
      tenantId: row.tenantId,
      user: row.user,
    }));
  }

  async fetchResourceList(subscription: Account): Promise<Resource[]> {
    const base = `${this.armEndpoint}/subscriptions/${encodeURIComponent(subscription.id)}/providers`;
    const page = pageOf(ArmResourceSchema);
    const call = { tenantId: subscription.tenantId, scope: ARM_SCOPE };

    const [vaults, apps] = await Promise.all([
      this.rest.listAll(
        { ...call, url: `${base}/Microsoft.KeyVault/vaults?api-version=${KEYVAULT_API}` },
        page
      ),
      this.rest.listAll(
        { ...call, url: `${base}/Microsoft.App/containerApps?api-version=${CONTAINERAPPS_API}` },
        page
      ),
    ]);

    const common = { subscriptionId: subscription.id, tenantId: subscription.tenantId };
    const resources: Resource[] = [
      ...vaults.map(
        (v): KeyVaultResource => ({
          kind: "keyvault",
          id: v.id,
          name: v.name,
          location: v.location,
          resourceGroup: resourceGroupOf(v.id),
          ...common,
        })
      ),
      ...apps.map(
        (a): ContainerAppResource => ({
          kind: "containerapp",
          id: a.id,
          name: a.name,
          location: a.location,
          resourceGroup: resourceGroupOf(a.id),
          ...common,
        })
      ),
    ];
    this.log.debug("resources listed", {
      subscription: subscription.id,
      vaults: vaults.length,
      apps: apps.length,
    });
    return resources;
  }

  async fetchSecretList(resource: Resource): Promise<SecretMeta[]> {
    if (resource.kind === "containerapp") {
      const list = await this.rest.json(
        {
          method: "POST",
          url: `${this.armEndpoint}${resource.id}/listSecrets?api-version=${CONTAINERAPPS_API}`,
          tenantId: resource.tenantId,
          scope: ARM_SCOPE,
        },
        ContainerAppSecretListSchema
      );
      return list.value.map((s) => ({ name: s.name, value: s.value }));
    }

    const items = await this.rest.listAll(
      {
        url: `${this.vaultUrl(resource)}/secrets?api-version=${VAULT_DATA_API}`,
        tenantId: resource.tenantId,
        scope: VAULT_SCOPE,
      },
      pageOf(VaultSecretItemSchema)
    );
    return items.map((item) => ({
      name: secretNameOf(item.id),
      id: item.id,
      contentType: item.contentType,
      attributes: toAttributes(item.attributes),
    }));
  }

  async fetchSecretValue(resource: Resource, secretName: string): Promise<SecretValue> {
    if (resource.kind === "containerapp") {
      const secrets = await this.fetchSecretList(resource);
      const found = secrets.find((s) => s.name === secretName);
      if (!found || found.value === undefined) {
        throw new Error(`Secret "${secretName}" was not found in Container App "${resource.name}"`);
      }
      return { name: found.name, value: found.value };
    }

    const bundle = await this.rest.json(
      {
        url: this.vaultSecretUrl(resource, secretName),
        tenantId: resource.tenantId,
        scope: VAULT_SCOPE,
      },
      VaultSecretBundleSchema
    );
    return {
      name: secretName,
      value: bundle.value,
      contentType: bundle.contentType,
      attributes: toAttributes(bundle.attributes),
    };
  }

  async setSecret(resource: Resource, name: string, value: string): Promise<void> {
    if (resource.kind === "containerapp") {
      await exec(this.run, [
        "containerapp",
        "secret",
        "set",
        ...this.appArgs(resource),
        "--secrets",
        `${name}=${value}`,
      ]);
      return;
    }
    await this.rest.send({
      method: "PUT",
      url: this.vaultSecretUrl(resource, name),
      tenantId: resource.tenantId,
      scope: VAULT_SCOPE,
      body: { value },
    });
  }

  async deleteSecret(resource: Resource, name: string): Promise<void> {
    if (resource.kind === "containerapp") {
      await exec(this.run, [
        "containerapp",
        "secret",
        "remove",
        ...this.appArgs(resource),
        "--secret-names",
        name,
      ]);
      return;
    }
    await this.rest.send({
      method: "DELETE",
      url: this.vaultSecretUrl(resource, name),
      tenantId: resource.tenantId,
      scope: VAULT_SCOPE,
    });
  }

  private vaultUrl(vault: KeyVaultResource): string {
    return `https://${vault.name}.${this.vaultDnsSuffix}`;
  }

  private vaultSecretUrl(vault: KeyVaultResource, name: string): string {
    return `${this.vaultUrl(vault)}/secrets/${encodeURIComponent(name)}?api-version=${VAULT_DATA_API}`;
  }

  private appArgs(app: ContainerAppResource): string[] {
    return [
      "--name",
      app.name,
      "--resource-group",
      app.resourceGroup,
      "--subscription",
      app.subscriptionId,
    ];
  }
}
