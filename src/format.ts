import type { Resource, SecretAttributes, SecretValue } from "./backends/types";

const pad = (n: number) => String(n).padStart(2, "0");

/** ISO timestamp → `YYYY-MM-DD HH:mm:ss` in local time; `-` when absent. */
export function formatDate(iso: string | undefined): string {
  if (!iso) return "-";
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function resourceLabel(resource: Resource): string {
  return resource.kind === "keyvault"
    ? `[kv] ${resource.name}`
    : `[app] ${resource.name}`;
}

/** Detail lines shown under a revealed secret. */
export function detailLines(
  resource: Resource,
  secret: SecretValue
): string[] {
  const lines = [`Name: ${secret.name}`, `Value: ${secret.value}`];
  if (resource.kind === "containerapp") return lines;

  const attrs: SecretAttributes = secret.attributes ?? {};
  lines.push(
    `Created: ${formatDate(attrs.created)}`,
    `Updated: ${formatDate(attrs.updated)}`,
    `Expires: ${attrs.expires ? formatDate(attrs.expires) : "Never"}`,
    `Enabled: ${attrs.enabled === true ? "Yes" : "No"}`
  );
  if (secret.contentType) lines.push(`Content type: ${secret.contentType}`);
  return lines;
}
