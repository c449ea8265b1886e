import type { Circuit, MemDecl, RegularModule } from "../ir/circuit.js";
import { declaredNames } from "../ir/map.js";

/**
 * Reserved names of one scope (the circuit, a module, or a memory's ports).
 * Scopes do not nest: a namespace only knows what was reserved in it.
 */
export class Namespace {
  readonly #names = new Set<string>();
  readonly #indices = new Map<string, number>();

  static of(names: Iterable<string>): Namespace {
    const ns = new Namespace();
    for (const name of names) ns.reserve(name);
    return ns;
  }

  static forCircuit(circuit: Circuit): Namespace {
    return Namespace.of(circuit.modules.map((m) => m.name));
  }

  static forModule(module: RegularModule): Namespace {
    return Namespace.of(declaredNames(module));
  }

  static forMemory(mem: MemDecl): Namespace {
    return Namespace.of([...mem.readers, ...mem.writers, ...mem.readwriters]);
  }

  contains(name: string): boolean {
    return this.#names.has(name);
  }

  /** Marks `name` as used. Returns false if it already was. */
  reserve(name: string): boolean {
    if (this.#names.has(name)) return false;
    this.#names.add(name);
    return true;
  }

  /** `base` if free, else the first free `base_N` counting from the last index handed out for `base`. */
  newName(base: string): string {
    if (this.reserve(base)) return base;
    let idx = this.#indices.get(base) ?? 0;
    let candidate: string;
    do {
      candidate = `${base}_${idx}`;
      idx++;
    } while (!this.reserve(candidate));
    this.#indices.set(base, idx);
    return candidate;
  }

  /**
   * Appends `delimiter` to `base` until the result is neither reserved here nor
   * in `extraReserved`, then reserves it.
   */
  allocate(base: string, extraReserved: ReadonlySet<string> = new Set(), delimiter = "_"): string {
    let candidate = `${base}${delimiter}`;
    while (this.#names.has(candidate) || extraReserved.has(candidate)) {
      candidate = `${candidate}${delimiter}`;
    }
    this.reserve(candidate);
    return candidate;
  }

  names(): ReadonlySet<string> {
    return new Set(this.#names);
  }
}
