#!/usr/bin/env node
import { Command } from "commander";
import { browseCommand } from "./commands/browse";
import { deleteCommand } from "./commands/delete";
import { getCommand } from "./commands/get";
import { listCommand } from "./commands/list";
import { setCommand } from "./commands/set";
import { setupCommand } from "./commands/setup";

const program = new Command();

program
  .name("vaultnav")
  .description("Browse and edit Azure Key Vault and Container App secrets")
  .version("0.1.0");

program.addCommand(browseCommand, { isDefault: true });
program.addCommand(listCommand);
program.addCommand(getCommand);
program.addCommand(setCommand);
program.addCommand(deleteCommand);
program.addCommand(setupCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
