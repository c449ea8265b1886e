import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import { RULE_NAMES, SkipSet, isRuleName, parseSkipSet, type RuleSpec } from "@circuit-renamer/compiler";

export const CONFIG_FILE_NAME = "circuit-renamer.json";

export type PassConfig = {
  readonly spec: RuleSpec;
  readonly skips: SkipSet;
};

export type RenamerConfig = {
  readonly schema: 1;
  readonly passes: readonly PassConfig[];
};

export const DEFAULT_CONFIG: RenamerConfig = {
  schema: 1,
  passes: [{ spec: { rule: "verilog-keywords" }, skips: SkipSet.empty }],
};

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be a JSON object.`);
  }
  return Object.fromEntries(Object.entries(value));
}

function assertKnownKeys(value: Record<string, unknown>, allowed: readonly string[], label: string): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new Error(`${label}: unknown key '${key}'.`);
    }
  }
}

function asString(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${label} must be a non-empty string.`);
  }
  return value;
}

function asStringArray(value: unknown, label: string): readonly string[] {
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string" && entry.length > 0)) {
    throw new Error(`${label} must be an array of non-empty strings.`);
  }
  return value;
}

function parseRuleSpec(pass: Record<string, unknown>, label: string): RuleSpec {
  const rule = asString(pass.rule, `${label}.rule`);
  if (!isRuleName(rule)) {
    throw new Error(`${label}.rule must be one of ${RULE_NAMES.map((r) => `'${r}'`).join(", ")} (got '${rule}').`);
  }
  switch (rule) {
    case "keywords":
      assertKnownKeys(pass, ["rule", "skip", "keywords"], label);
      return { rule, keywords: asStringArray(pass.keywords, `${label}.keywords`) };
    case "prefix":
      assertKnownKeys(pass, ["rule", "skip", "prefix"], label);
      return { rule, prefix: asString(pass.prefix, `${label}.prefix`) };
    case "verilog-keywords":
    case "lower-case":
    case "upper-case":
      assertKnownKeys(pass, ["rule", "skip"], label);
      return { rule };
  }
}

function parsePassConfig(value: unknown, index: number): PassConfig {
  const label = `${CONFIG_FILE_NAME}: 'passes[${index}]'`;
  const pass = asRecord(value, label);
  const spec = parseRuleSpec(pass, label);
  const skips = pass.skip === undefined ? SkipSet.empty : parseSkipSet(asStringArray(pass.skip, `${label}.skip`));
  return { spec, skips };
}

export function parseRenamerConfig(value: unknown): RenamerConfig {
  const root = asRecord(value, CONFIG_FILE_NAME);
  assertKnownKeys(root, ["schema", "passes"], CONFIG_FILE_NAME);

  if (root.schema !== 1) {
    throw new Error(`Unsupported ${CONFIG_FILE_NAME} schema.`);
  }
  if (!Array.isArray(root.passes) || root.passes.length === 0) {
    throw new Error(`${CONFIG_FILE_NAME}: 'passes' must be a non-empty array.`);
  }
  return { schema: 1, passes: root.passes.map((p, i) => parsePassConfig(p, i)) };
}

export function readJson(path: string): unknown {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return parsed;
}

export function loadRenamerConfig(path: string): RenamerConfig {
  return parseRenamerConfig(readJson(path));
}

/** Nearest `circuit-renamer.json` at or above `fromDir`, if any. */
export function findConfigFile(fromDir: string): string | undefined {
  let cur = resolve(fromDir);
  while (true) {
    const candidate = join(cur, CONFIG_FILE_NAME);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(cur);
    if (parent === cur) return undefined;
    cur = parent;
  }
}

/** The explicit config when given, else the nearest discovered one, else {@link DEFAULT_CONFIG}. */
export function resolveRenamerConfig(fromDir: string, explicit?: string): RenamerConfig {
  if (explicit !== undefined) return loadRenamerConfig(resolve(fromDir, explicit));
  const found = findConfigFile(fromDir);
  return found === undefined ? DEFAULT_CONFIG : loadRenamerConfig(found);
}
