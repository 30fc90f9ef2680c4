import type { Resource } from "../backends/types";

export const ACCOUNTS_KEY = "accounts";

export function resourcesKey(subscriptionId: string): string {
  return `resources:${subscriptionId}`;
}

function secretNamespaces(resource: Resource): { list: string; value: string } {
  return resource.kind === "keyvault"
    ? { list: "secrets", value: "secretvalue" }
    : { list: "caappsecrets", value: "caappsecretvalue" };
}

export function secretsKey(resource: Resource): string {
  return `${secretNamespaces(resource).list}:${resource.name}`;
}

/** Prefix shared by every value key of one resource. */
export function secretValuePrefix(resource: Resource): string {
  return `${secretNamespaces(resource).value}:${resource.name}:`;
}

export function secretValueKey(resource: Resource, secretName: string): string {
  return `${secretValuePrefix(resource)}${secretName}`;
}
