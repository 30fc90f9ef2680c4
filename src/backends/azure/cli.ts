import { spawn } from "child_process";
import type { z } from "zod";
import { CommandError } from "../../errors";
import type { CommandResult, CommandRunner } from "../types";

/** Spawn `az` with the given arguments; no shell, so values need no quoting. */
export function createCommandRunner(azPath: string): CommandRunner {
  return (args) =>
    new Promise<CommandResult>((resolve) => {
      const proc = spawn(azPath, args, {
        stdio: ["ignore", "pipe", "pipe"],
        env: { ...process.env, AZURE_CORE_NO_COLOR: "true" },
      });
      let stdout = "";
      let stderr = "";
      proc.stdout.setEncoding("utf-8");
      proc.stderr.setEncoding("utf-8");
      proc.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });
      proc.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });
      proc.on("error", (err) => {
        resolve({ exitCode: -1, stdout: "", stderr: `${err.name}: ${err.message}` });
      });
      proc.on("close", (code) => {
        resolve({ exitCode: code ?? -1, stdout, stderr });
      });
    });
}

/** Run `az` and return trimmed stdout; a non-zero exit throws CommandError. */
export async function exec(run: CommandRunner, args: string[]): Promise<string> {
  const result = await run(args);
  if (result.exitCode !== 0) {
    throw new CommandError(`az ${args.slice(0, 2).join(" ")}`, result.exitCode, result.stderr);
  }
  return result.stdout.trim();
}

/** Run `az ... --output json` and validate the payload. */
export async function execJson<T>(
  run: CommandRunner,
  args: string[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const raw = await exec(run, [...args, "--output", "json"]);
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`az ${args.slice(0, 2).join(" ")} returned invalid JSON`);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `az ${args.slice(0, 2).join(" ")} returned an unexpected shape: ${result.error.issues[0]?.message ?? "invalid"}`
    );
  }
  return result.data;
}

/** `az --version` exits zero. */
export async function isAzInstalled(run: CommandRunner): Promise<boolean> {
  const result = await run(["--version"]);
  return result.exitCode === 0;
}

/** `az account show` exits zero only with a signed-in session. */
export async function checkStatus(
  run: CommandRunner
): Promise<"not_installed" | "not_logged_in" | "ready"> {
  if (!(await isAzInstalled(run))) return "not_installed";
  const result = await run(["account", "show", "--output", "json"]);
  return result.exitCode === 0 ? "ready" : "not_logged_in";
}
