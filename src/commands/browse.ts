import { Command } from "commander";
import { createInterface, type Interface } from "readline/promises";
import type { Orchestrator } from "../orchestrator/orchestrator";
import { renderView } from "../render";
import { bootstrap } from "./shared";

export type BrowseAction =
  | { type: "select"; level: "account" | "subscription" | "resource" | "secret"; index: number }
  | { type: "filter"; text: string }
  | { type: "set"; name: string; value: string }
  | { type: "delete"; name?: string }
  | { type: "refresh"; force: boolean }
  | { type: "reload" }
  | { type: "show" }
  | { type: "help" }
  | { type: "quit" }
  | { type: "invalid"; message: string };

const LEVEL_KEYS = {
  a: "account",
  s: "subscription",
  r: "resource",
  k: "secret",
} as const;

export const HELP = [
  "a <n>             select account",
  "s <n>             select subscription or group",
  "r <n>             select resource",
  "k <n>             select secret",
  "/<text>           filter secrets (/ alone clears)",
  "set <name> <val>  update a secret in the selected resource",
  "new <name> <val>  create a secret in the selected resource",
  "del [name]        delete the selected (or named) secret",
  "reload            refetch the selected subscription's resources",
  "refresh           reload, keeping the selection",
  "refresh!          drop every cache and reload",
  "q                 quit",
];

function isLevelKey(key: string): key is keyof typeof LEVEL_KEYS {
  return key in LEVEL_KEYS;
}

export function parseInput(line: string): BrowseAction {
  const input = line.trim();
  if (input === "") return { type: "show" };
  if (input.startsWith("/")) return { type: "filter", text: input.slice(1) };

  const [head, ...rest] = input.split(/\s+/);
  const command = head.toLowerCase();

  if (isLevelKey(command)) {
    const index = Number(rest[0]);
    if (rest.length !== 1 || !Number.isInteger(index) || index < 0) {
      return { type: "invalid", message: `Usage: ${command} <n>` };
    }
    return { type: "select", level: LEVEL_KEYS[command], index };
  }

  switch (command) {
    case "set":
    case "new": {
      if (rest.length < 2) return { type: "invalid", message: `Usage: ${command} <name> <value>` };
      // The value is everything after the name, spaces included.
      const afterHead = input.slice(head.length).trimStart();
      const value = afterHead.slice(rest[0].length).trimStart();
      return { type: "set", name: rest[0], value };
    }
    case "del":
    case "delete":
      return { type: "delete", name: rest[0] };
    case "reload":
      return { type: "reload" };
    case "refresh":
      return { type: "refresh", force: false };
    case "refresh!":
      return { type: "refresh", force: true };
    case "?":
    case "help":
      return { type: "help" };
    case "q":
    case "quit":
    case "exit":
      return { type: "quit" };
    default:
      return { type: "invalid", message: `Unknown command: ${head}. Type 'help'.` };
  }
}

async function confirm(rl: Interface, question: string): Promise<boolean> {
  const answer = await rl.question(`${question} (y/N) `);
  return answer.trim().toLowerCase() === "y";
}

/** Run one parsed action. Returns false when the session should end. */
export async function runAction(
  orchestrator: Orchestrator,
  action: BrowseAction,
  ask: (question: string) => Promise<boolean>,
  print: (line: string) => void
): Promise<boolean> {
  switch (action.type) {
    case "select":
      if (action.level === "account") await orchestrator.selectAccount(action.index);
      else if (action.level === "subscription") await orchestrator.selectSubscription(action.index);
      else if (action.level === "resource") await orchestrator.selectResource(action.index);
      else await orchestrator.selectSecret(action.index);
      return true;
    case "filter":
      await orchestrator.setFilter(action.text);
      return true;
    case "refresh":
      await orchestrator.refresh({ force: action.force });
      return true;
    case "reload":
      await orchestrator.reloadResources();
      return true;
    case "set":
    case "delete": {
      const { resource, secret } = orchestrator.selection();
      if (!resource) {
        print("Select a resource first.");
        return true;
      }
      if (action.type === "set") {
        await orchestrator.execute({ type: "set", resource, name: action.name, value: action.value });
        return true;
      }
      const name = action.name ?? secret?.name;
      if (!name) {
        print("Select a secret first.");
        return true;
      }
      if (await ask(`Delete "${name}" from ${resource.name}?`)) {
        await orchestrator.execute({ type: "delete", resource, name });
      }
      return true;
    }
    case "help":
      for (const line of HELP) print(line);
      return true;
    case "invalid":
      print(action.message);
      return true;
    case "quit":
      return false;
    case "show":
      return true;
  }
}

export const browseCommand = new Command("browse")
  .description("Browse accounts, subscriptions, vaults, apps, and secrets interactively")
  .action(async () => {
    const app = await bootstrap();
    const { orchestrator } = app;
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    const print = (line: string) => console.log(line);

    // Background warm-up progress arrives between prompts; keep it on stderr.
    const unsubscribe = orchestrator.subscribe((event) => {
      if (event.type === "progress" && event.event.total > 0) {
        process.stderr.write(
          `\r  resources ${event.event.completed}/${event.event.total}${event.event.completed === event.event.total ? "\n" : ""}`
        );
      }
    });

    try {
      await orchestrator.refresh();
      for (;;) {
        for (const line of renderView(orchestrator.view, { showValue: true, numbered: true })) {
          print(line);
        }
        const line = await rl.question("> ");
        const keepGoing = await runAction(
          orchestrator,
          parseInput(line),
          (q) => confirm(rl, q),
          print
        );
        if (!keepGoing) break;
      }
    } finally {
      unsubscribe();
      orchestrator.dispose();
      rl.close();
    }
  });
