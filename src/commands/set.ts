import { Command } from "commander";
import type { Resource } from "../backends/types";
import { describeError } from "../errors";
import { bootstrap, fail, resolveTarget, type TargetOptions } from "./shared";

export const setCommand = new Command("set")
  .description("Create or update a secret")
  .argument("<name>", "secret name")
  .argument("<value>", "secret value")
  .option("--vault <name>", "Key Vault name")
  .option("--app <name>", "Container App name")
  .option("--resource-group <rg>", "resource group of the Container App")
  .option("--subscription <id>", "subscription id or name")
  .option("--tenant <id>", "tenant to request tokens for")
  .action(async (name: string, value: string, opts: TargetOptions) => {
    const app = await bootstrap();
    let resource: Resource;
    try {
      resource = await resolveTarget(app.fetchers, opts);
    } catch (err) {
      fail(err instanceof Error ? err.message : String(err));
    }

    const result = await app.fetchers.applyMutation({ type: "set", resource, name, value });
    if (!result.success) fail(describeError(result.error));
    console.log(`  ✓ ${name} → ${resource.name}`);
  });
