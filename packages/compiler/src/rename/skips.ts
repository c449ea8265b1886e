import { fail } from "../diagnostics.js";
import { isLocal, parseTarget, serializeTarget, targetKey, type Target } from "../ir/targets.js";

/** Targets a rename pass must leave untouched. Only local targets are accepted. */
export class SkipSet {
  static readonly empty = new SkipSet([]);

  readonly #keys: ReadonlySet<string>;
  readonly targets: readonly Target[];

  private constructor(targets: readonly Target[]) {
    this.targets = Object.freeze([...targets]);
    this.#keys = new Set(targets.map(targetKey));
  }

  static of(targets: Iterable<Target>): SkipSet {
    const list = [...targets];
    for (const target of list) validateSkipTarget(target);
    return new SkipSet(list);
  }

  get size(): number {
    return this.#keys.size;
  }

  has(target: Target): boolean {
    return this.#keys.has(targetKey(target));
  }
}

function validateSkipTarget(target: Target): void {
  if (!isLocal(target)) {
    fail(
      "CRN1002",
      `Cannot skip non-local target ${serializeTarget(target)}: only names declared directly in a module can be renamed.`
    );
  }
  if (target.kind === "reference" && target.fields.length > 1) {
    fail(
      "CRN1003",
      `Cannot skip ${serializeTarget(target)}: memory port sub-fields are never renamed.`
    );
  }
}

export function createSkipSet(targets: Iterable<Target>): SkipSet {
  return SkipSet.of(targets);
}

/** Parses serialized targets (`~Circuit|Module>ref`) and validates them as skip entries. */
export function parseSkipSet(texts: Iterable<string>): SkipSet {
  return SkipSet.of([...texts].map(parseTarget));
}
