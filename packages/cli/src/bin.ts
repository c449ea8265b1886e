#!/usr/bin/env -S node --import tsx
import { argv, cwd, exit } from "node:process";
import { pathToFileURL } from "node:url";

import { CompileError, RULE_NAMES } from "@circuit-renamer/compiler";

import { runRename } from "./internal/commands/rename.js";

export type Cmd = "rename" | "rules" | "help";

function usage(): void {
  console.log(
    [
      "circuit-renamer",
      "",
      "Usage:",
      "  circuit-renamer rename <circuit.json> [--config <file>] [--out <file>]",
      "                         [--renames <file>] [--renames-in <file>] [--emit json|text]",
      "  circuit-renamer rules",
      "",
    ].join("\n")
  );
}

export function parseCommand(args: readonly string[]): Cmd {
  const [cmd] = args;
  if (!cmd) return "help";
  if (cmd === "rename" || cmd === "rules" || cmd === "help") return cmd;
  return "help";
}

/** `<code>: <message>` for compiler diagnostics, the bare message for other errors. */
export function formatError(err: unknown): string {
  if (err instanceof CompileError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

async function main(): Promise<void> {
  try {
    const cmd = parseCommand(argv.slice(2));
    switch (cmd) {
      case "rename":
        await runRename({ dir: cwd(), argv: argv.slice(3) });
        return;
      case "rules":
        for (const rule of RULE_NAMES) console.log(rule);
        return;
      default:
        usage();
        exit(argv.length > 2 && argv[2] !== "help" ? 1 : 0);
    }
  } catch (err: unknown) {
    console.error(formatError(err));
    exit(1);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
