import { writeFileSync } from "node:fs";
import { resolve } from "node:path";

import {
  RenameLedger,
  decodeCircuit,
  passFromSpec,
  writeCircuit,
  type Circuit,
} from "@circuit-renamer/compiler";

import { readJson, resolveRenamerConfig } from "../config.js";

export type RenameArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
};

export type EmitFormat = "json" | "text";

export type RenameParsed = {
  readonly inputPath: string;
  readonly configPath?: string;
  readonly outPath?: string;
  readonly renamesPath?: string;
  readonly renamesInPath?: string;
  readonly emit: EmitFormat;
};

export type RenameResult = {
  readonly circuit: Circuit;
  readonly ledger: RenameLedger;
  readonly output: string;
};

export type RenameLog = (line: string) => void;

const USAGE =
  "Usage: circuit-renamer rename <circuit.json> [--config <file>] [--out <file>] [--renames <file>] [--renames-in <file>] [--emit json|text]";

export function parseRenameArgs(args: RenameArgs): RenameParsed {
  let inputPath: string | undefined;
  let configPath: string | undefined;
  let outPath: string | undefined;
  let renamesPath: string | undefined;
  let renamesInPath: string | undefined;
  let emit: EmitFormat = "json";

  const it = args.argv[Symbol.iterator]();
  const value = (flag: string): string => {
    const v = it.next();
    if (v.done) throw new Error(`rename: ${flag} requires a value`);
    return v.value;
  };

  while (true) {
    const next = it.next();
    if (next.done) break;
    const a = next.value;
    switch (a) {
      case "--config":
        configPath = resolve(args.dir, value(a));
        break;
      case "--out":
        outPath = resolve(args.dir, value(a));
        break;
      case "--renames":
        renamesPath = resolve(args.dir, value(a));
        break;
      case "--renames-in":
        renamesInPath = resolve(args.dir, value(a));
        break;
      case "--emit": {
        const v = value(a);
        if (v !== "json" && v !== "text") throw new Error(`rename: --emit must be 'json' or 'text' (got '${v}')`);
        emit = v;
        break;
      }
      case "--help":
      case "-h":
        throw new Error(USAGE);
      default:
        if (a.startsWith("-")) throw new Error(`rename: unknown arg: ${a}`);
        if (inputPath !== undefined) throw new Error(`rename: unexpected extra input: ${a}`);
        inputPath = resolve(args.dir, a);
    }
  }

  if (inputPath === undefined) {
    throw new Error("rename: missing required <circuit.json>");
  }

  return { inputPath, configPath, outPath, renamesPath, renamesInPath, emit };
}

function render(circuit: Circuit, emit: EmitFormat): string {
  return emit === "text" ? writeCircuit(circuit) : `${JSON.stringify(circuit, null, 2)}\n`;
}

/**
 * Decodes the circuit, runs every configured pass in order on one shared
 * ledger and writes the result. Without `--out` the circuit goes to the log.
 */
export async function runRename(args: RenameArgs, deps?: { readonly log?: RenameLog }): Promise<RenameResult> {
  const log = deps?.log ?? ((line: string) => console.log(line));
  const parsed = parseRenameArgs(args);
  const config = resolveRenamerConfig(args.dir, parsed.configPath);

  const ledger =
    parsed.renamesInPath === undefined ? new RenameLedger() : RenameLedger.fromJSON(readJson(parsed.renamesInPath));
  let circuit = decodeCircuit(readJson(parsed.inputPath));

  for (const pass of config.passes) {
    const renamePass = passFromSpec(pass.spec);
    const step = new RenameLedger();
    circuit = renamePass.run(circuit, step, pass.skips);
    ledger.compose(step);
    log(`${renamePass.name}: ${step.size} rename${step.size === 1 ? "" : "s"}`);
  }

  const output = render(circuit, parsed.emit);
  if (parsed.outPath === undefined) {
    log(output.trimEnd());
  } else {
    writeFileSync(parsed.outPath, output, "utf-8");
  }
  if (parsed.renamesPath !== undefined) {
    writeFileSync(parsed.renamesPath, `${JSON.stringify(ledger.toJSON(), null, 2)}\n`, "utf-8");
  }

  return { circuit, ledger, output };
}
