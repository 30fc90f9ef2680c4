import { Command } from "commander";
import { renderView } from "../render";
import { bootstrap } from "./shared";

interface ListOptions {
  filter?: string;
  values: boolean;
}

export const listCommand = new Command("list")
  .description("Load the default account, subscription, and resource and print what was found")
  .option("--filter <text>", "only show secrets whose name contains text")
  .option("--values", "also reveal the first matching secret", false)
  .action(async (opts: ListOptions) => {
    const app = await bootstrap();
    const { orchestrator } = app;
    if (opts.filter) await orchestrator.setFilter(opts.filter);

    try {
      await orchestrator.refresh();
    } finally {
      orchestrator.dispose();
    }

    for (const line of renderView(orchestrator.view, { showValue: opts.values })) {
      console.log(line);
    }
    if (orchestrator.view.accounts.status === "error") process.exitCode = 1;
  });
