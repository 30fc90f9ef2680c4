import { Command } from "commander";
import { checkStatus, createCommandRunner } from "../backends/azure/cli";
import { loadConfig } from "../config";

const INSTALL_HINTS = [
  "  macOS:   brew install azure-cli",
  "  Windows: winget install -e --id Microsoft.AzureCLI",
  "  Linux:   https://learn.microsoft.com/cli/azure/install-azure-cli-linux",
];

export const setupCommand = new Command("setup")
  .description("Check that the Azure CLI is installed and signed in")
  .action(async () => {
    const config = await loadConfig();
    const status = await checkStatus(createCommandRunner(config.azPath));

    if (status === "not_installed") {
      console.log(`✗ Azure CLI not found (${config.azPath}). Install it:\n`);
      for (const hint of INSTALL_HINTS) console.log(hint);
      process.exitCode = 1;
      return;
    }
    console.log("✓ Azure CLI installed");

    if (status === "not_logged_in") {
      console.log("✗ Not signed in. Run: az login");
      process.exitCode = 1;
      return;
    }
    console.log("✓ Signed in");
  });
