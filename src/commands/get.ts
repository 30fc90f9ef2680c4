import { Command } from "commander";
import type { Resource } from "../backends/types";
import { describeError } from "../errors";
import { detailLines } from "../format";
import { bootstrap, fail, resolveTarget, type TargetOptions } from "./shared";

interface GetOptions extends TargetOptions {
  details: boolean;
}

export const getCommand = new Command("get")
  .description("Print one secret value from a Key Vault or Container App")
  .argument("<name>", "secret name")
  .option("--vault <name>", "Key Vault name")
  .option("--app <name>", "Container App name")
  .option("--resource-group <rg>", "resource group of the Container App")
  .option("--subscription <id>", "subscription id or name")
  .option("--tenant <id>", "tenant to request tokens for")
  .option("--details", "print attributes alongside the value", false)
  .action(async (name: string, opts: GetOptions) => {
    const app = await bootstrap();
    let resource: Resource;
    try {
      resource = await resolveTarget(app.fetchers, opts);
    } catch (err) {
      fail(err instanceof Error ? err.message : String(err));
    }

    const result = await app.fetchers.getSecretValue(resource, name);
    if (!result.ok) fail(describeError(result.error));

    if (opts.details) {
      for (const line of detailLines(resource, result.value)) console.log(line);
    } else {
      console.log(result.value.value);
    }
  });
