import type { Circuit, Expr, GroundType, Module, Port, Stmt } from "./circuit.js";

function emitWidth(width: number | undefined): string {
  return width === undefined ? "" : `<${width}>`;
}

function emitType(ty: GroundType): string {
  switch (ty.kind) {
    case "uint":
      return `UInt${emitWidth(ty.width)}`;
    case "sint":
      return `SInt${emitWidth(ty.width)}`;
    case "analog":
      return `Analog${emitWidth(ty.width)}`;
    case "clock":
      return "Clock";
    case "reset":
      return "Reset";
    case "async_reset":
      return "AsyncReset";
  }
}

export function emitExpr(expr: Expr): string {
  switch (expr.kind) {
    case "ref":
      return expr.name;
    case "subfield":
      return `${emitExpr(expr.expr)}.${expr.name}`;
    case "uint_lit":
      return `UInt${emitWidth(expr.width)}(${expr.value})`;
    case "sint_lit":
      return `SInt${emitWidth(expr.width)}(${expr.value})`;
    case "prim": {
      const operands = [...expr.args.map(emitExpr), ...expr.consts.map((c) => `${c}`)];
      return `${expr.op}(${operands.join(", ")})`;
    }
    case "mux":
      return `mux(${emitExpr(expr.cond)}, ${emitExpr(expr.tval)}, ${emitExpr(expr.fval)})`;
    case "validif":
      return `validif(${emitExpr(expr.cond)}, ${emitExpr(expr.value)})`;
  }
}

function emitStmtLines(st: Stmt, indent: string): string[] {
  switch (st.kind) {
    case "wire":
      return [`${indent}wire ${st.name} : ${emitType(st.type)}`];
    case "reg": {
      const reset = st.reset
        ? ` with : (reset => (${emitExpr(st.reset.signal)}, ${emitExpr(st.reset.init)}))`
        : "";
      return [`${indent}reg ${st.name} : ${emitType(st.type)}, ${emitExpr(st.clock)}${reset}`];
    }
    case "node":
      return [`${indent}node ${st.name} = ${emitExpr(st.value)}`];
    case "inst":
      return [`${indent}inst ${st.name} of ${st.module}`];
    case "mem": {
      const inner = `${indent}  `;
      const out: string[] = [`${indent}mem ${st.name} :`];
      out.push(`${inner}data-type => ${emitType(st.dataType)}`);
      out.push(`${inner}depth => ${st.depth}`);
      out.push(`${inner}read-latency => ${st.readLatency}`);
      out.push(`${inner}write-latency => ${st.writeLatency}`);
      for (const r of st.readers) out.push(`${inner}reader => ${r}`);
      for (const w of st.writers) out.push(`${inner}writer => ${w}`);
      for (const rw of st.readwriters) out.push(`${inner}readwriter => ${rw}`);
      out.push(`${inner}read-under-write => ${st.readUnderWrite}`);
      return out;
    }
    case "connect":
      return [`${indent}${emitExpr(st.loc)} <= ${emitExpr(st.expr)}`];
    case "invalidate":
      return [`${indent}${emitExpr(st.expr)} is invalid`];
    case "when": {
      const out: string[] = [`${indent}when ${emitExpr(st.cond)} :`];
      for (const s of st.then) out.push(...emitStmtLines(s, `${indent}  `));
      if (st.then.length === 0) out.push(`${indent}  skip`);
      if (st.else.length > 0) {
        out.push(`${indent}else :`);
        for (const s of st.else) out.push(...emitStmtLines(s, `${indent}  `));
      }
      return out;
    }
    case "block":
      return st.stmts.flatMap((s) => emitStmtLines(s, indent));
    case "stop":
      return [`${indent}stop(${emitExpr(st.clock)}, ${emitExpr(st.en)}, ${st.exitCode})`];
    case "print": {
      const args = [emitExpr(st.clock), emitExpr(st.en), JSON.stringify(st.format), ...st.args.map(emitExpr)];
      return [`${indent}printf(${args.join(", ")})`];
    }
    case "skip":
      return [`${indent}skip`];
  }
}

function emitPort(p: Port, indent: string): string {
  return `${indent}${p.direction} ${p.name} : ${emitType(p.type)}`;
}

function emitModule(m: Module, indent: string): string[] {
  const inner = `${indent}  `;
  const out: string[] = [];
  if (m.kind === "extmodule") {
    out.push(`${indent}extmodule ${m.name} :`);
    for (const p of m.ports) out.push(emitPort(p, inner));
    out.push(`${inner}defname = ${m.defname}`);
    for (const param of m.params) {
      const value = typeof param.value === "string" ? JSON.stringify(param.value) : `${param.value}`;
      out.push(`${inner}parameter ${param.name} = ${value}`);
    }
    return out;
  }
  out.push(`${indent}module ${m.name} :`);
  for (const p of m.ports) out.push(emitPort(p, inner));
  if (m.ports.length > 0 && m.body.length > 0) out.push("");
  for (const st of m.body) out.push(...emitStmtLines(st, inner));
  if (m.ports.length === 0 && m.body.length === 0) out.push(`${inner}skip`);
  return out;
}

export function writeCircuit(circuit: Circuit, opts?: { readonly header?: readonly string[] }): string {
  const parts: string[] = [];
  for (const h of opts?.header ?? []) parts.push(h);
  parts.push(`circuit ${circuit.main} :`);
  let first = true;
  for (const m of circuit.modules) {
    if (!first) parts.push("");
    parts.push(...emitModule(m, "  "));
    first = false;
  }
  parts.push("");
  return parts.join("\n");
}
