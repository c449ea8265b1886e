import { fail } from "../diagnostics.js";
import type {
  Circuit,
  Direction,
  Expr,
  GroundType,
  Module,
  ParamValue,
  Port,
  ReadUnderWrite,
  Stmt,
} from "./circuit.js";
import { isIdentifier } from "./targets.js";

type JsonRecord = Record<string, unknown>;

function asRecord(value: unknown, label: string): JsonRecord {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    fail("CRN3001", `${label} must be a JSON object.`);
  }
  return Object.fromEntries(Object.entries(value));
}

function assertKnownKeys(value: JsonRecord, allowed: readonly string[], label: string): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      fail("CRN3001", `${label}: unknown key '${key}'.`);
    }
  }
}

function asString(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    fail("CRN3001", `${label} must be a non-empty string.`);
  }
  return value;
}

function asCount(value: unknown, label: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    fail("CRN3001", `${label} must be a non-negative integer.`);
  }
  return value;
}

function asArray(value: unknown, label: string): readonly unknown[] {
  if (!Array.isArray(value)) {
    fail("CRN3001", `${label} must be an array.`);
  }
  return value;
}

function asName(value: unknown, label: string): string {
  const name = asString(value, label);
  if (!isIdentifier(name)) {
    fail("CRN3001", `${label} must be an identifier (got ${JSON.stringify(name)}).`);
  }
  return name;
}

function asNameArray(value: unknown, label: string): readonly string[] {
  return asArray(value, label).map((v, i) => asName(v, `${label}[${i}]`));
}

function optionalWidth(value: unknown, label: string): { readonly width?: number } {
  return value === undefined ? {} : { width: asCount(value, label) };
}

function kindOf(value: JsonRecord, label: string): string {
  return asString(value.kind, `${label}.kind`);
}

function decodeType(value: unknown, label: string): GroundType {
  const rec = asRecord(value, label);
  const kind = kindOf(rec, label);
  switch (kind) {
    case "uint":
    case "sint":
    case "analog":
      assertKnownKeys(rec, ["kind", "width"], label);
      return { kind, ...optionalWidth(rec.width, `${label}.width`) };
    case "clock":
    case "reset":
    case "async_reset":
      assertKnownKeys(rec, ["kind"], label);
      return { kind };
    default:
      return fail("CRN3001", `${label}: unknown type kind '${kind}'.`);
  }
}

function decodeLiteralValue(value: unknown, label: string): string {
  const text = asString(value, label);
  if (!/^-?[0-9]+$/.test(text)) {
    fail("CRN3001", `${label} must be a decimal integer string (got ${JSON.stringify(text)}).`);
  }
  return text;
}

export function decodeExpr(value: unknown, label: string): Expr {
  const rec = asRecord(value, label);
  const kind = kindOf(rec, label);
  switch (kind) {
    case "ref":
      assertKnownKeys(rec, ["kind", "name"], label);
      return { kind, name: asName(rec.name, `${label}.name`) };
    case "subfield":
      assertKnownKeys(rec, ["kind", "expr", "name"], label);
      return {
        kind,
        expr: decodeExpr(rec.expr, `${label}.expr`),
        name: asName(rec.name, `${label}.name`),
      };
    case "uint_lit":
    case "sint_lit":
      assertKnownKeys(rec, ["kind", "value", "width"], label);
      return {
        kind,
        value: decodeLiteralValue(rec.value, `${label}.value`),
        ...optionalWidth(rec.width, `${label}.width`),
      };
    case "prim":
      assertKnownKeys(rec, ["kind", "op", "args", "consts"], label);
      return {
        kind,
        op: asString(rec.op, `${label}.op`),
        args: asArray(rec.args, `${label}.args`).map((a, i) => decodeExpr(a, `${label}.args[${i}]`)),
        consts:
          rec.consts === undefined
            ? []
            : asArray(rec.consts, `${label}.consts`).map((c, i) => asCount(c, `${label}.consts[${i}]`)),
      };
    case "mux":
      assertKnownKeys(rec, ["kind", "cond", "tval", "fval"], label);
      return {
        kind,
        cond: decodeExpr(rec.cond, `${label}.cond`),
        tval: decodeExpr(rec.tval, `${label}.tval`),
        fval: decodeExpr(rec.fval, `${label}.fval`),
      };
    case "validif":
      assertKnownKeys(rec, ["kind", "cond", "value"], label);
      return {
        kind,
        cond: decodeExpr(rec.cond, `${label}.cond`),
        value: decodeExpr(rec.value, `${label}.value`),
      };
    default:
      return fail("CRN3001", `${label}: unknown expression kind '${kind}'.`);
  }
}

function decodeReadUnderWrite(value: unknown, label: string): ReadUnderWrite {
  if (value === undefined) return "undefined";
  if (value !== "old" && value !== "new" && value !== "undefined") {
    fail("CRN3001", `${label} must be 'old', 'new' or 'undefined'.`);
  }
  return value;
}

function decodeStmts(value: unknown, label: string): readonly Stmt[] {
  return asArray(value, label).map((s, i) => decodeStmt(s, `${label}[${i}]`));
}

export function decodeStmt(value: unknown, label: string): Stmt {
  const rec = asRecord(value, label);
  const kind = kindOf(rec, label);
  switch (kind) {
    case "wire":
      assertKnownKeys(rec, ["kind", "name", "type"], label);
      return { kind, name: asName(rec.name, `${label}.name`), type: decodeType(rec.type, `${label}.type`) };
    case "reg": {
      assertKnownKeys(rec, ["kind", "name", "type", "clock", "reset"], label);
      const base = {
        kind,
        name: asName(rec.name, `${label}.name`),
        type: decodeType(rec.type, `${label}.type`),
        clock: decodeExpr(rec.clock, `${label}.clock`),
      };
      if (rec.reset === undefined) return base;
      const reset = asRecord(rec.reset, `${label}.reset`);
      assertKnownKeys(reset, ["signal", "init"], `${label}.reset`);
      return {
        ...base,
        reset: {
          signal: decodeExpr(reset.signal, `${label}.reset.signal`),
          init: decodeExpr(reset.init, `${label}.reset.init`),
        },
      };
    }
    case "node":
      assertKnownKeys(rec, ["kind", "name", "value"], label);
      return { kind, name: asName(rec.name, `${label}.name`), value: decodeExpr(rec.value, `${label}.value`) };
    case "inst":
      assertKnownKeys(rec, ["kind", "name", "module"], label);
      return { kind, name: asName(rec.name, `${label}.name`), module: asName(rec.module, `${label}.module`) };
    case "mem":
      assertKnownKeys(
        rec,
        ["kind", "name", "dataType", "depth", "readLatency", "writeLatency", "readers", "writers", "readwriters", "readUnderWrite"],
        label
      );
      return {
        kind,
        name: asName(rec.name, `${label}.name`),
        dataType: decodeType(rec.dataType, `${label}.dataType`),
        depth: asCount(rec.depth, `${label}.depth`),
        readLatency: asCount(rec.readLatency, `${label}.readLatency`),
        writeLatency: asCount(rec.writeLatency, `${label}.writeLatency`),
        readers: rec.readers === undefined ? [] : asNameArray(rec.readers, `${label}.readers`),
        writers: rec.writers === undefined ? [] : asNameArray(rec.writers, `${label}.writers`),
        readwriters: rec.readwriters === undefined ? [] : asNameArray(rec.readwriters, `${label}.readwriters`),
        readUnderWrite: decodeReadUnderWrite(rec.readUnderWrite, `${label}.readUnderWrite`),
      };
    case "connect":
      assertKnownKeys(rec, ["kind", "loc", "expr"], label);
      return { kind, loc: decodeExpr(rec.loc, `${label}.loc`), expr: decodeExpr(rec.expr, `${label}.expr`) };
    case "invalidate":
      assertKnownKeys(rec, ["kind", "expr"], label);
      return { kind, expr: decodeExpr(rec.expr, `${label}.expr`) };
    case "when":
      assertKnownKeys(rec, ["kind", "cond", "then", "else"], label);
      return {
        kind,
        cond: decodeExpr(rec.cond, `${label}.cond`),
        then: decodeStmts(rec.then, `${label}.then`),
        else: rec.else === undefined ? [] : decodeStmts(rec.else, `${label}.else`),
      };
    case "block":
      assertKnownKeys(rec, ["kind", "stmts"], label);
      return { kind, stmts: decodeStmts(rec.stmts, `${label}.stmts`) };
    case "stop":
      assertKnownKeys(rec, ["kind", "clock", "en", "exitCode"], label);
      return {
        kind,
        clock: decodeExpr(rec.clock, `${label}.clock`),
        en: decodeExpr(rec.en, `${label}.en`),
        exitCode: asCount(rec.exitCode, `${label}.exitCode`),
      };
    case "print":
      assertKnownKeys(rec, ["kind", "clock", "en", "format", "args"], label);
      if (typeof rec.format !== "string") fail("CRN3001", `${label}.format must be a string.`);
      return {
        kind,
        clock: decodeExpr(rec.clock, `${label}.clock`),
        en: decodeExpr(rec.en, `${label}.en`),
        format: rec.format,
        args:
          rec.args === undefined
            ? []
            : asArray(rec.args, `${label}.args`).map((a, i) => decodeExpr(a, `${label}.args[${i}]`)),
      };
    case "skip":
      assertKnownKeys(rec, ["kind"], label);
      return { kind };
    default:
      return fail("CRN3001", `${label}: unknown statement kind '${kind}'.`);
  }
}

function decodeDirection(value: unknown, label: string): Direction {
  if (value !== "input" && value !== "output") {
    fail("CRN3001", `${label} must be 'input' or 'output'.`);
  }
  return value;
}

function decodePort(value: unknown, label: string): Port {
  const rec = asRecord(value, label);
  assertKnownKeys(rec, ["name", "direction", "type"], label);
  return {
    name: asName(rec.name, `${label}.name`),
    direction: decodeDirection(rec.direction, `${label}.direction`),
    type: decodeType(rec.type, `${label}.type`),
  };
}

function decodeParamValue(value: unknown, label: string): ParamValue {
  if (typeof value === "string" || typeof value === "number") return value;
  return fail("CRN3001", `${label} must be a string or a number.`);
}

function decodeModule(value: unknown, label: string): Module {
  const rec = asRecord(value, label);
  const kind = kindOf(rec, label);
  const name = asName(rec.name, `${label}.name`);
  const ports = asArray(rec.ports, `${label}.ports`).map((p, i) => decodePort(p, `${label}.ports[${i}]`));
  switch (kind) {
    case "module":
      assertKnownKeys(rec, ["kind", "name", "ports", "body"], label);
      return { kind, name, ports, body: decodeStmts(rec.body, `${label}.body`) };
    case "extmodule":
      assertKnownKeys(rec, ["kind", "name", "ports", "defname", "params"], label);
      return {
        kind,
        name,
        ports,
        defname: rec.defname === undefined ? name : asString(rec.defname, `${label}.defname`),
        params:
          rec.params === undefined
            ? []
            : asArray(rec.params, `${label}.params`).map((p, i) => {
                const param = asRecord(p, `${label}.params[${i}]`);
                assertKnownKeys(param, ["name", "value"], `${label}.params[${i}]`);
                return {
                  name: asString(param.name, `${label}.params[${i}].name`),
                  value: decodeParamValue(param.value, `${label}.params[${i}].value`),
                };
              }),
      };
    default:
      return fail("CRN3001", `${label}: unknown module kind '${kind}'.`);
  }
}

/** Validates the JSON interchange form of a circuit and returns it as IR. */
export function decodeCircuit(value: unknown): Circuit {
  const rec = asRecord(value, "circuit");
  assertKnownKeys(rec, ["main", "modules"], "circuit");
  return {
    main: asName(rec.main, "circuit.main"),
    modules: asArray(rec.modules, "circuit.modules").map((m, i) => decodeModule(m, `circuit.modules[${i}]`)),
  };
}
