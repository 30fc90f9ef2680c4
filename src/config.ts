import { readFile } from "fs/promises";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";

const DAY_MS = 24 * 60 * 60 * 1000;

const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export const VaultnavConfigSchema = z.object({
  azPath: z.string().min(1).default("az"),
  concurrency: z.number().int().min(1).max(32).default(5),
  cacheTtlMs: z.number().int().positive().default(365 * DAY_MS),
  tokenRefreshMarginMs: z.number().int().nonnegative().default(5 * 60 * 1000),
  logLevel: LogLevelSchema.default("warn"),
  prettyLogs: z.boolean().default(false),
  armEndpoint: z.string().url().default("https://management.azure.com"),
  vaultDnsSuffix: z.string().min(1).default("vault.azure.net"),
});

export type VaultnavConfig = z.infer<typeof VaultnavConfigSchema>;

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.VAULTNAV_CONFIG ?? join(homedir(), ".config", "vaultnav", "config.json");
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.VAULTNAV_AZ_PATH) overrides.azPath = env.VAULTNAV_AZ_PATH;
  if (env.VAULTNAV_CONCURRENCY) {
    overrides.concurrency = Number(env.VAULTNAV_CONCURRENCY);
  }
  if (env.VAULTNAV_LOG_LEVEL) overrides.logLevel = env.VAULTNAV_LOG_LEVEL;
  if (env.VAULTNAV_PRETTY_LOGS) {
    overrides.prettyLogs = env.VAULTNAV_PRETTY_LOGS.toLowerCase() === "true";
  }
  return overrides;
}

async function readConfigFile(
  path: string,
  required: boolean
): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch {
    if (required) {
      throw new Error(`Cannot read ${path}. Check VAULTNAV_CONFIG.`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`Cannot parse ${path}: not valid JSON.`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Cannot parse ${path}: expected a JSON object.`);
  }
  return { ...parsed };
}

/**
 * Resolve configuration: defaults, then the config file, then environment.
 * The file is optional unless VAULTNAV_CONFIG points at it explicitly.
 */
export async function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): Promise<VaultnavConfig> {
  const path = defaultConfigPath(env);
  const fromFile = await readConfigFile(path, env.VAULTNAV_CONFIG !== undefined);

  const result = VaultnavConfigSchema.safeParse({
    ...fromFile,
    ...envOverrides(env),
  });
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration (${path}): ${issues}`);
  }
  return result.data;
}
