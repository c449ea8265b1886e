import { fail } from "../diagnostics.js";

/** One hop of an instance path: the instance name and the module it instantiates. */
export type InstanceStep = {
  readonly instance: string;
  readonly ofModule: string;
};

export type CircuitTarget = {
  readonly kind: "circuit";
  readonly circuit: string;
};

export type ModuleTarget = {
  readonly kind: "module";
  readonly circuit: string;
  readonly module: string;
};

export type InstanceTarget = {
  readonly kind: "instance";
  readonly circuit: string;
  readonly module: string;
  readonly path: readonly InstanceStep[];
  readonly instance: string;
  readonly ofModule: string;
};

export type ReferenceTarget = {
  readonly kind: "reference";
  readonly circuit: string;
  readonly module: string;
  readonly path: readonly InstanceStep[];
  readonly ref: string;
  readonly fields: readonly string[];
};

/**
 * Address of a renamable entity.
 *
 * A reference with one field names an instance port seen from the parent or a
 * memory reader/writer/readwriter; deeper fields name memory port sub-signals.
 */
export type Target = CircuitTarget | ModuleTarget | InstanceTarget | ReferenceTarget;

export function circuitTarget(circuit: string): CircuitTarget {
  return { kind: "circuit", circuit };
}

export function moduleTarget(circuit: string, module: string): ModuleTarget {
  return { kind: "module", circuit, module };
}

export function instanceTarget(
  circuit: string,
  module: string,
  instance: string,
  ofModule: string,
  path: readonly InstanceStep[] = []
): InstanceTarget {
  return { kind: "instance", circuit, module, path, instance, ofModule };
}

export function referenceTarget(
  circuit: string,
  module: string,
  ref: string,
  fields: readonly string[] = [],
  path: readonly InstanceStep[] = []
): ReferenceTarget {
  return { kind: "reference", circuit, module, path, ref, fields };
}

export function moduleOf(target: CircuitTarget, name: string): ModuleTarget {
  return moduleTarget(target.circuit, name);
}

export function refOf(target: ModuleTarget, name: string): ReferenceTarget {
  return referenceTarget(target.circuit, target.module, name);
}

export function instOf(target: ModuleTarget, instance: string, ofModule: string): InstanceTarget {
  return instanceTarget(target.circuit, target.module, instance, ofModule);
}

export function fieldOf(target: ReferenceTarget, field: string): ReferenceTarget {
  return { ...target, fields: [...target.fields, field] };
}

/** The module an instance target instantiates, addressed from the circuit root. */
export function ofModuleTarget(target: InstanceTarget): ModuleTarget {
  return moduleTarget(target.circuit, target.ofModule);
}

/** A target is local when it names something declared directly in its module (no instance path). */
export function isLocal(target: Target): boolean {
  switch (target.kind) {
    case "circuit":
    case "module":
      return true;
    case "instance":
    case "reference":
      return target.path.length === 0;
  }
}

/** The name the target's last component carries. */
export function terminalName(target: Target): string {
  switch (target.kind) {
    case "circuit":
      return target.circuit;
    case "module":
      return target.module;
    case "instance":
      return target.instance;
    case "reference":
      return target.fields.at(-1) ?? target.ref;
  }
}

/** `target` with its last component renamed to `name`. */
export function withTerminalName(target: Target, name: string): Target {
  switch (target.kind) {
    case "circuit":
      return circuitTarget(name);
    case "module":
      return { ...target, module: name };
    case "instance":
      return { ...target, instance: name };
    case "reference":
      if (target.fields.length === 0) return { ...target, ref: name };
      return { ...target, fields: [...target.fields.slice(0, -1), name] };
  }
}

function serializePath(path: readonly InstanceStep[]): string {
  return path.map((step) => `/${step.instance}:${step.ofModule}`).join("");
}

export function serializeTarget(target: Target): string {
  switch (target.kind) {
    case "circuit":
      return `~${target.circuit}`;
    case "module":
      return `~${target.circuit}|${target.module}`;
    case "instance":
      return `~${target.circuit}|${target.module}${serializePath(target.path)}/${target.instance}:${target.ofModule}`;
    case "reference": {
      const fields = target.fields.map((f) => `.${f}`).join("");
      return `~${target.circuit}|${target.module}${serializePath(target.path)}>${target.ref}${fields}`;
    }
  }
}

/** Structural identity; two targets are equal iff their keys are equal. */
export function targetKey(target: Target): string {
  return serializeTarget(target);
}

export function targetsEqual(a: Target, b: Target): boolean {
  return targetKey(a) === targetKey(b);
}

const NAME = /^[A-Za-z_][A-Za-z0-9_$]*$/;

export function isIdentifier(name: string): boolean {
  return NAME.test(name);
}

function checkName(name: string, text: string): string {
  if (!NAME.test(name)) {
    fail("CRN1001", `Malformed target ${JSON.stringify(text)}: '${name}' is not an identifier.`);
  }
  return name;
}

export function parseTarget(text: string): Target {
  if (!text.startsWith("~")) {
    fail("CRN1001", `Malformed target ${JSON.stringify(text)}: expected a leading '~'.`);
  }
  const body = text.slice(1);
  const bar = body.indexOf("|");
  if (bar === -1) return circuitTarget(checkName(body, text));

  const circuit = checkName(body.slice(0, bar), text);
  const rest = body.slice(bar + 1);

  const gt = rest.indexOf(">");
  const hierarchy = gt === -1 ? rest : rest.slice(0, gt);
  const [moduleName = "", ...stepTexts] = hierarchy.split("/");
  const module = checkName(moduleName, text);
  const steps = stepTexts.map((stepText): InstanceStep => {
    const parts = stepText.split(":");
    if (parts.length !== 2) {
      fail("CRN1001", `Malformed target ${JSON.stringify(text)}: expected '<instance>:<module>' (got '${stepText}').`);
    }
    const [instance = "", ofModule = ""] = parts;
    return { instance: checkName(instance, text), ofModule: checkName(ofModule, text) };
  });

  if (gt === -1) {
    const last = steps.at(-1);
    if (last === undefined) return moduleTarget(circuit, module);
    return instanceTarget(circuit, module, last.instance, last.ofModule, steps.slice(0, -1));
  }

  const [refName = "", ...fields] = rest.slice(gt + 1).split(".");
  return referenceTarget(
    circuit,
    module,
    checkName(refName, text),
    fields.map((f) => checkName(f, text)),
    steps
  );
}
