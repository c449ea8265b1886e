import { fail } from "../diagnostics.js";
import {
  circuitTarget,
  instanceTarget,
  moduleTarget,
  parseTarget,
  referenceTarget,
  serializeTarget,
  targetKey,
  terminalName,
  withTerminalName,
  type InstanceStep,
  type Target,
} from "../ir/targets.js";

type Entry = {
  readonly from: Target;
  readonly to: Target[];
};

export type RenameLedgerJson = Readonly<Record<string, readonly string[]>>;

/**
 * Old-target to new-target record shared by rename passes.
 *
 * Lookups are exact: a key only matches the very target that was registered.
 * Use {@link RenameLedger.track} to follow a target whose enclosing circuit,
 * module or instances were renamed.
 */
export class RenameLedger {
  readonly #entries = new Map<string, Entry>();

  get size(): number {
    return this.#entries.size;
  }

  register(from: Target, to: Target): void {
    const key = targetKey(from);
    const entry = this.#entries.get(key);
    if (entry === undefined) {
      this.#entries.set(key, { from, to: [to] });
      return;
    }
    if (!entry.to.some((t) => targetKey(t) === targetKey(to))) entry.to.push(to);
  }

  get(from: Target): readonly Target[] | undefined {
    return this.#entries.get(targetKey(from))?.to;
  }

  /** The single replacement of `from`, or undefined when there is none or more than one. */
  resolve(from: Target): Target | undefined {
    const to = this.get(from);
    if (to === undefined || to.length !== 1) return undefined;
    return to[0];
  }

  entries(): readonly { readonly from: Target; readonly to: readonly Target[] }[] {
    return [...this.#entries.values()];
  }

  /**
   * Folds a later ledger into this one, then adds the entries of `next` whose
   * key is not already present here.
   *
   * Replacements recorded here keep the enclosing names of their source, while
   * `next` is keyed by the names this ledger produced. Each replacement is
   * lifted through this ledger's circuit, module and instance renames before
   * it is looked up in `next`; a hit only changes its terminal name.
   */
  compose(next: RenameLedger): void {
    const chased = [...this.#entries.values()].map((entry) => ({
      entry,
      to: entry.to.flatMap((t) => {
        const found = next.get(this.#rename(t, false));
        return found === undefined ? [t] : found.map((n) => withTerminalName(t, terminalName(n)));
      }),
    }));
    for (const { entry, to } of chased) {
      entry.to.length = 0;
      for (const t of to) {
        if (!entry.to.some((x) => targetKey(x) === targetKey(t))) entry.to.push(t);
      }
    }
    for (const [key, entry] of next.#entries) {
      if (!this.#entries.has(key)) this.#entries.set(key, { from: entry.from, to: [...entry.to] });
    }
  }

  /**
   * Where `target` ended up. Each component is renamed on its own: circuit,
   * module, every instance hop, then the reference and its first field.
   * Deeper fields are kept as they are.
   */
  track(target: Target): Target {
    return this.#rename(target, true);
  }

  /** Renames the components enclosing the terminal name, and the terminal itself when `terminal` is set. */
  #rename(target: Target, terminal: boolean): Target {
    if (target.kind === "circuit") {
      return terminal ? circuitTarget(this.#name(target)) : target;
    }
    const circuit = this.#name(circuitTarget(target.circuit));
    const mt = moduleTarget(target.circuit, target.module);
    if (target.kind === "module") {
      return moduleTarget(circuit, terminal ? this.#name(mt) : target.module);
    }
    const module = this.#name(mt);

    let parent = target.module;
    const path: InstanceStep[] = [];
    for (const step of target.path) {
      path.push(this.#step(target.circuit, parent, step));
      parent = step.ofModule;
    }

    if (target.kind === "instance") {
      const last = this.#step(target.circuit, parent, { instance: target.instance, ofModule: target.ofModule });
      return instanceTarget(circuit, module, terminal ? last.instance : target.instance, last.ofModule, path);
    }

    const [first, ...inner] = target.fields;
    if (first === undefined) {
      const ref = terminal ? this.#name(referenceTarget(target.circuit, parent, target.ref)) : target.ref;
      return referenceTarget(circuit, module, ref, [], path);
    }
    const ref = this.#name(referenceTarget(target.circuit, parent, target.ref));
    const field =
      terminal || inner.length > 0
        ? this.#name(referenceTarget(target.circuit, parent, target.ref, [first]))
        : first;
    return referenceTarget(circuit, module, ref, [field, ...inner], path);
  }

  #step(circuit: string, parent: string, step: InstanceStep): InstanceStep {
    return {
      instance: this.#name(instanceTarget(circuit, parent, step.instance, step.ofModule)),
      ofModule: this.#name(moduleTarget(circuit, step.ofModule)),
    };
  }

  /** Terminal name of the single replacement of `target`, or its own terminal name. */
  #name(target: Target): string {
    const to = this.resolve(target);
    if (to === undefined) return terminalName(target);
    if (to.kind !== target.kind) {
      fail(
        "CRN2006",
        `Ledger maps ${serializeTarget(target)} to ${serializeTarget(to)}, which does not end in a renamable component of the same kind.`
      );
    }
    return terminalName(to);
  }

  toJSON(): RenameLedgerJson {
    const out: Record<string, readonly string[]> = {};
    const keys = [...this.#entries.keys()].sort((a, b) => a.localeCompare(b));
    for (const key of keys) {
      const entry = this.#entries.get(key);
      if (entry !== undefined) out[key] = entry.to.map(serializeTarget);
    }
    return out;
  }

  static fromJSON(value: unknown): RenameLedger {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      fail("CRN3002", "Rename ledger JSON must be an object of target to target list.");
    }
    const ledger = new RenameLedger();
    const entries: [string, unknown][] = Object.entries(value);
    for (const [from, to] of entries) {
      if (!Array.isArray(to) || !to.every((t): t is string => typeof t === "string")) {
        fail("CRN3002", `Rename ledger entry '${from}' must be an array of target strings.`);
      }
      const source = parseTarget(from);
      for (const t of to) ledger.register(source, parseTarget(t));
    }
    return ledger;
  }
}
