import { leafToRootOrder } from "../analysis/instance-graph.js";
import { fail } from "../diagnostics.js";
import type { Circuit, Decl, Expr, Module, RegularModule, Stmt } from "../ir/circuit.js";
import { isDecl } from "../ir/circuit.js";
import { mapExprChildren, mapStmtChildren, mapStmtTreeExprs } from "../ir/map.js";
import {
  circuitTarget,
  fieldOf,
  instOf,
  moduleOf,
  moduleTarget,
  ofModuleTarget,
  refOf,
  serializeTarget,
  targetKey,
  terminalName,
  withTerminalName,
  type CircuitTarget,
  type ModuleTarget,
  type Target,
} from "../ir/targets.js";
import { InstanceMap } from "./instance-map.js";
import { RenameLedger } from "./ledger.js";
import { Namespace } from "./namespace.js";
import { SkipSet } from "./skips.js";

/**
 * Picks a new name for `name` in the scope `namespace` belongs to, or returns
 * undefined to keep it. A returned name must be free in `namespace`, or
 * reserved there by the rule itself. The engine reserves it after the rename.
 */
export type ManipulateRule = (name: string, namespace: Namespace) => string | undefined;

/** Every module of the circuit, each after the modules it instantiates. */
export type ModuleOrder = (circuit: Circuit) => readonly Module[];

export type ManipulateNamesOptions = {
  /** Receives this run's renames once the whole circuit has been processed. */
  readonly ledger?: RenameLedger;
  readonly skips?: SkipSet;
  readonly moduleOrder?: ModuleOrder;
};

type RenameContext = {
  readonly rule: ManipulateRule;
  readonly skips: SkipSet;
  readonly renames: RenameLedger;
  readonly namespaces: Map<string, Namespace>;
  /** Module names share one scope, apart from the circuit name. */
  readonly moduleNames: Namespace;
  readonly instances: InstanceMap;
};

function renamedTarget(target: Target, name: string): Target {
  if (target.kind === "reference" && target.fields.length > 1) {
    fail("CRN2006", `Cannot rename ${serializeTarget(target)}: memory port sub-fields are fixed.`);
  }
  return withTerminalName(target, name);
}

/** Runs the rule for a declared name and records the rename. */
function declare(ctx: RenameContext, name: string, target: Target, namespace: Namespace): string {
  if (ctx.skips.has(target)) return name;
  const next = ctx.rule(name, namespace);
  if (next === undefined || next === name) return name;
  namespace.reserve(next);
  ctx.renames.register(target, renamedTarget(target, next));
  return next;
}

/** Read-only: the name recorded for `target` so far, or `name` when there is no single replacement. */
function lookup(ctx: RenameContext, name: string, target: Target): string {
  const to = ctx.renames.resolve(target);
  if (to === undefined) return name;
  if (to.kind !== target.kind) {
    fail("CRN2006", `Rename of ${serializeTarget(target)} to ${serializeTarget(to)} changes the kind of target.`);
  }
  return terminalName(to);
}

function namespaceOf(ctx: RenameContext, scope: Target, seed: () => Namespace): Namespace {
  const key = targetKey(scope);
  const existing = ctx.namespaces.get(key);
  if (existing !== undefined) return existing;
  const created = seed();
  ctx.namespaces.set(key, created);
  return created;
}

function onDecl(ctx: RenameContext, decl: Decl, mt: ModuleTarget, ns: Namespace): Decl {
  switch (decl.kind) {
    case "inst": {
      const module = lookup(ctx, decl.module, moduleTarget(mt.circuit, decl.module));
      const inst = instOf(mt, decl.name, decl.module);
      const name = declare(ctx, decl.name, inst, ns);
      ctx.instances.bindInstance(refOf(mt, decl.name), inst);
      return { ...decl, name, module };
    }
    case "mem": {
      const mem = refOf(mt, decl.name);
      const name = declare(ctx, decl.name, mem, ns);
      const portNs = namespaceOf(ctx, mem, () => Namespace.forMemory(decl));
      const port = (p: string): string => declare(ctx, p, fieldOf(mem, p), portNs);
      ctx.instances.bindMemory(mem);
      return {
        ...decl,
        name,
        readers: decl.readers.map(port),
        writers: decl.writers.map(port),
        readwriters: decl.readwriters.map(port),
      };
    }
    case "wire":
    case "reg":
    case "node":
      return { ...decl, name: declare(ctx, decl.name, refOf(mt, decl.name), ns) };
  }
}

function onStmtDecls(ctx: RenameContext, stmt: Stmt, mt: ModuleTarget, ns: Namespace): Stmt {
  if (isDecl(stmt)) return onDecl(ctx, stmt, mt, ns);
  return mapStmtChildren(stmt, (s) => onStmtDecls(ctx, s, mt, ns));
}

/**
 * Rewrites uses. Only three shapes can name a declaration: a plain reference,
 * `instance.port` / `memory.port`, and `memory.port.signal`, whose last
 * component belongs to the fixed memory port schema.
 */
function onExpr(ctx: RenameContext, expr: Expr, mt: ModuleTarget): Expr {
  switch (expr.kind) {
    case "ref": {
      const local = refOf(mt, expr.name);
      const binding = ctx.instances.lookup(local);
      const scope = binding?.kind === "instance" ? binding.target : local;
      return { ...expr, name: lookup(ctx, expr.name, scope) };
    }
    case "subfield":
      return onSubfield(ctx, expr.expr, expr.name, mt);
    default:
      return mapExprChildren(expr, (e) => onExpr(ctx, e, mt));
  }
}

function onSubfield(ctx: RenameContext, base: Expr, field: string, mt: ModuleTarget): Expr {
  if (base.kind === "ref") {
    const binding = ctx.instances.require(refOf(mt, base.name));
    if (binding.kind === "instance") {
      const port = refOf(ofModuleTarget(binding.target), field);
      return {
        kind: "subfield",
        expr: { ...base, name: lookup(ctx, base.name, binding.target) },
        name: lookup(ctx, field, port),
      };
    }
    const mem = binding.target;
    return {
      kind: "subfield",
      expr: { ...base, name: lookup(ctx, base.name, mem) },
      name: lookup(ctx, field, fieldOf(mem, field)),
    };
  }

  if (base.kind === "subfield") {
    const root = base.expr;
    if (root.kind !== "ref") {
      fail("CRN2002", `Unsupported subfield '.${base.name}.${field}' in module '${mt.module}': nesting is too deep.`);
    }
    const binding = ctx.instances.require(refOf(mt, root.name));
    if (binding.kind !== "memory") {
      fail(
        "CRN2002",
        `Expression ${root.name}.${base.name}.${field} in module '${mt.module}' reaches below an instance port.`
      );
    }
    const mem = binding.target;
    return {
      kind: "subfield",
      expr: {
        ...base,
        expr: { ...root, name: lookup(ctx, root.name, mem) },
        name: lookup(ctx, base.name, fieldOf(mem, base.name)),
      },
      name: field,
    };
  }

  return fail(
    "CRN2002",
    `Unsupported subfield '.${field}' in module '${mt.module}': only instance ports and memory ports can be selected.`
  );
}

function onRegularModule(ctx: RenameContext, module: RegularModule, mt: ModuleTarget): RegularModule {
  const ns = namespaceOf(ctx, mt, () => Namespace.forModule(module));
  const name = declare(ctx, module.name, mt, ctx.moduleNames);
  const ports = module.ports.map((p) => ({ ...p, name: declare(ctx, p.name, refOf(mt, p.name), ns) }));
  const declared = module.body.map((s) => onStmtDecls(ctx, s, mt, ns));
  const body = declared.map((s) => mapStmtTreeExprs(s, (e) => onExpr(ctx, e, mt)));
  return { ...module, name, ports, body };
}

function onModule(ctx: RenameContext, module: Module, ct: CircuitTarget): Module {
  const mt = moduleOf(ct, module.name);
  if (module.kind === "extmodule") {
    return { ...module, name: declare(ctx, module.name, mt, ctx.moduleNames) };
  }
  return onRegularModule(ctx, module, mt);
}

/**
 * Passes every declared name of `circuit` through `rule` in one leaf-to-root
 * sweep and returns the renamed circuit. Uses are rewritten to follow the
 * renames, including instance ports and memory ports.
 *
 * Skipping the circuit target leaves the whole circuit as it is.
 */
export function manipulateNames(
  circuit: Circuit,
  rule: ManipulateRule,
  options: ManipulateNamesOptions = {}
): Circuit {
  const skips = options.skips ?? SkipSet.empty;
  const ct = circuitTarget(circuit.main);
  if (skips.has(ct)) return circuit;

  const ctx: RenameContext = {
    rule,
    skips,
    renames: new RenameLedger(),
    namespaces: new Map(),
    moduleNames: Namespace.forCircuit(circuit),
    instances: new InstanceMap(),
  };

  const circuitNs = namespaceOf(ctx, ct, () => Namespace.forCircuit(circuit));
  const main = declare(ctx, circuit.main, ct, circuitNs);

  const order = (options.moduleOrder ?? leafToRootOrder)(circuit);
  const renamed = new Map<string, Module>();
  for (const module of order) {
    renamed.set(targetKey(moduleOf(ct, module.name)), onModule(ctx, module, ct));
  }

  const modules = circuit.modules.map((m) => {
    const out = renamed.get(targetKey(moduleOf(ct, m.name)));
    if (out === undefined) {
      fail("CRN2008", `Module order for circuit '${circuit.main}' left out module '${m.name}'.`);
    }
    return out;
  });

  options.ledger?.compose(ctx.renames);
  return { main, modules };
}

export type RenamePass = {
  readonly name: string;
  readonly rule: ManipulateRule;
  run(circuit: Circuit, ledger?: RenameLedger, skips?: SkipSet): Circuit;
};

export function createRenamePass(name: string, rule: ManipulateRule, moduleOrder?: ModuleOrder): RenamePass {
  return Object.freeze({
    name,
    rule,
    run(circuit: Circuit, ledger?: RenameLedger, skips?: SkipSet): Circuit {
      return manipulateNames(circuit, rule, { ledger, skips, moduleOrder });
    },
  });
}
