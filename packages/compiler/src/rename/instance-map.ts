import { fail } from "../diagnostics.js";
import {
  serializeTarget,
  targetKey,
  type InstanceTarget,
  type ReferenceTarget,
} from "../ir/targets.js";

export type InstanceBinding =
  | { readonly kind: "instance"; readonly target: InstanceTarget }
  | { readonly kind: "memory"; readonly target: ReferenceTarget };

/**
 * What a module-local name denotes when it is the base of a subfield.
 * Keyed by the reference target of the name as it was declared.
 */
export class InstanceMap {
  readonly #bindings = new Map<string, InstanceBinding>();

  bindInstance(local: ReferenceTarget, target: InstanceTarget): void {
    this.#bindings.set(targetKey(local), { kind: "instance", target });
  }

  bindMemory(local: ReferenceTarget): void {
    this.#bindings.set(targetKey(local), { kind: "memory", target: local });
  }

  lookup(local: ReferenceTarget): InstanceBinding | undefined {
    return this.#bindings.get(targetKey(local));
  }

  require(local: ReferenceTarget): InstanceBinding {
    const binding = this.lookup(local);
    if (binding === undefined) {
      fail(
        "CRN2001",
        `Subfield base ${serializeTarget(local)} is neither an instance nor a memory declared in its module.`
      );
    }
    return binding;
  }
}
