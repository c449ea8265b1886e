import verilogKeywordsData from "./verilog-keywords.json" with { type: "json" };

import { createRenamePass, type ManipulateRule, type RenamePass } from "./manipulate-names.js";

export const VERILOG_KEYWORDS: ReadonlySet<string> = new Set(verilogKeywordsData.keywords);

/**
 * Renames names that collide with a reserved word by appending `_` until the
 * result is free in the scope and is not itself reserved.
 */
export function removeKeywordCollisions(keywords: ReadonlySet<string>): ManipulateRule {
  return (name, namespace) => (keywords.has(name) ? namespace.allocate(name, keywords) : undefined);
}

function changeCase(map: (name: string) => string): ManipulateRule {
  return (name, namespace) => {
    const mapped = map(name);
    return mapped === name ? undefined : namespace.newName(mapped);
  };
}

export const lowerCaseNames: ManipulateRule = changeCase((name) => name.toLowerCase());

export const upperCaseNames: ManipulateRule = changeCase((name) => name.toUpperCase());

export function addPrefix(prefix: string): ManipulateRule {
  return (name, namespace) => namespace.newName(`${prefix}${name}`);
}

export const verilogRename: RenamePass = createRenamePass("verilog-rename", removeKeywordCollisions(VERILOG_KEYWORDS));
export const lowerCasePass: RenamePass = createRenamePass("lower-case-names", lowerCaseNames);
export const upperCasePass: RenamePass = createRenamePass("upper-case-names", upperCaseNames);

export type RuleSpec =
  | { readonly rule: "verilog-keywords" }
  | { readonly rule: "keywords"; readonly keywords: readonly string[] }
  | { readonly rule: "lower-case" }
  | { readonly rule: "upper-case" }
  | { readonly rule: "prefix"; readonly prefix: string };

export type RuleName = RuleSpec["rule"];

export const RULE_NAMES: readonly RuleName[] = Object.freeze([
  "verilog-keywords",
  "keywords",
  "lower-case",
  "upper-case",
  "prefix",
]);

export function isRuleName(value: string): value is RuleName {
  return RULE_NAMES.some((name) => name === value);
}

export function passFromSpec(spec: RuleSpec): RenamePass {
  switch (spec.rule) {
    case "verilog-keywords":
      return verilogRename;
    case "keywords":
      return createRenamePass("keyword-collisions", removeKeywordCollisions(new Set(spec.keywords)));
    case "lower-case":
      return lowerCasePass;
    case "upper-case":
      return upperCasePass;
    case "prefix":
      return createRenamePass(`prefix:${spec.prefix}`, addPrefix(spec.prefix));
  }
}
