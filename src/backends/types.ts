export interface AzureUser {
  name: string;
  type: string;
}

/** One subscription row as reported by `az account list --all`. */
export interface Account {
  id: string;
  name: string;
  isDefault: boolean;
  state: string;
  tenantId: string;
  user?: AzureUser;
}

export type ResourceKind = "keyvault" | "containerapp";

interface ResourceBase {
  id: string;
  name: string;
  location: string;
  resourceGroup: string;
  subscriptionId: string;
  /** Tenant the owning subscription lives in; tokens are issued per tenant. */
  tenantId: string;
}

export interface KeyVaultResource extends ResourceBase {
  kind: "keyvault";
}

export interface ContainerAppResource extends ResourceBase {
  kind: "containerapp";
}

export type Resource = KeyVaultResource | ContainerAppResource;

export interface SecretAttributes {
  enabled?: boolean;
  created?: string;
  updated?: string;
  expires?: string;
  notBefore?: string;
}

export interface SecretMeta {
  name: string;
  id?: string;
  contentType?: string;
  attributes?: SecretAttributes;
  /** Container App listings return values alongside names. */
  value?: string;
}

export interface SecretValue {
  name: string;
  value: string;
  contentType?: string;
  attributes?: SecretAttributes;
}

export interface Token {
  accessToken: string;
  /** Epoch milliseconds. */
  expiresOn: number;
}

/** Data source the fetchers and the orchestrator sit on. */
export interface CloudBackend {
  readonly name: string;
  fetchAccounts(): Promise<Account[]>;
  fetchResourceList(subscription: Account): Promise<Resource[]>;
  fetchSecretList(resource: Resource): Promise<SecretMeta[]>;
  fetchSecretValue(resource: Resource, secretName: string): Promise<SecretValue>;
  setSecret(resource: Resource, name: string, value: string): Promise<void>;
  deleteSecret(resource: Resource, name: string): Promise<void>;
}

export interface TokenIssuer {
  issueToken(tenantId: string, scope: string): Promise<Token>;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Runs one `az` invocation; never rejects for a non-zero exit. */
export type CommandRunner = (args: string[]) => Promise<CommandResult>;
