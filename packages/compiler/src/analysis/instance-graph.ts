import type { Circuit, Module } from "../ir/circuit.js";
import { forEachStmt } from "../ir/map.js";
import { fail } from "../diagnostics.js";

export type InstanceEdge = {
  readonly instance: string;
  readonly module: string;
};

/** Instances declared in `module`, in statement order. External modules have none. */
export function instancesOf(module: Module): readonly InstanceEdge[] {
  if (module.kind === "extmodule") return [];
  const out: InstanceEdge[] = [];
  forEachStmt(module.body, (stmt) => {
    if (stmt.kind === "inst") out.push({ instance: stmt.name, module: stmt.module });
  });
  return out;
}

export function moduleMap(circuit: Circuit): ReadonlyMap<string, Module> {
  const byName = new Map<string, Module>();
  for (const m of circuit.modules) {
    if (byName.has(m.name)) {
      fail("CRN2007", `Circuit '${circuit.main}' declares module '${m.name}' more than once.`);
    }
    byName.set(m.name, m);
  }
  return byName;
}

/**
 * Every module of `circuit` exactly once, each after all the modules it
 * instantiates. Modules reachable from the main module come first; modules
 * nothing reaches follow in declaration order.
 */
export function leafToRootOrder(circuit: Circuit): readonly Module[] {
  const byName = moduleMap(circuit);
  const main = byName.get(circuit.main);
  if (main === undefined) {
    fail("CRN2005", `Circuit '${circuit.main}' has no module named '${circuit.main}'.`);
  }

  const done = new Set<string>();
  const active: string[] = [];
  const order: Module[] = [];

  const visit = (module: Module): void => {
    if (done.has(module.name)) return;
    if (active.includes(module.name)) {
      const cycle = [...active.slice(active.indexOf(module.name)), module.name].join(" -> ");
      fail("CRN2004", `Instance cycle in circuit '${circuit.main}': ${cycle}`);
    }
    active.push(module.name);
    for (const edge of instancesOf(module)) {
      const child = byName.get(edge.module);
      if (child === undefined) {
        fail(
          "CRN2003",
          `Instance '${edge.instance}' in module '${module.name}' refers to undeclared module '${edge.module}'.`
        );
      }
      visit(child);
    }
    active.pop();
    done.add(module.name);
    order.push(module);
  };

  visit(main);
  for (const m of circuit.modules) visit(m);
  return order;
}
