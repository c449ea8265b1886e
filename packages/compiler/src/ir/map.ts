import type { Expr, RegularModule, Stmt } from "./circuit.js";

export type ExprMapper = (expr: Expr) => Expr;
export type StmtMapper = (stmt: Stmt) => Stmt;

/** Rebuilds `expr` with `fn` applied to each direct sub-expression. Leaves are returned as-is. */
export function mapExprChildren(expr: Expr, fn: ExprMapper): Expr {
  switch (expr.kind) {
    case "ref":
    case "uint_lit":
    case "sint_lit":
      return expr;
    case "subfield":
      return { ...expr, expr: fn(expr.expr) };
    case "prim":
      return { ...expr, args: expr.args.map(fn) };
    case "mux":
      return { ...expr, cond: fn(expr.cond), tval: fn(expr.tval), fval: fn(expr.fval) };
    case "validif":
      return { ...expr, cond: fn(expr.cond), value: fn(expr.value) };
  }
}

/** Rebuilds `stmt` with `fn` applied to the expressions it holds directly (not those of nested statements). */
export function mapStmtExprs(stmt: Stmt, fn: ExprMapper): Stmt {
  switch (stmt.kind) {
    case "wire":
    case "inst":
    case "mem":
    case "block":
    case "skip":
      return stmt;
    case "reg":
      return stmt.reset === undefined
        ? { ...stmt, clock: fn(stmt.clock) }
        : {
            ...stmt,
            clock: fn(stmt.clock),
            reset: { signal: fn(stmt.reset.signal), init: fn(stmt.reset.init) },
          };
    case "node":
      return { ...stmt, value: fn(stmt.value) };
    case "connect":
      return { ...stmt, loc: fn(stmt.loc), expr: fn(stmt.expr) };
    case "invalidate":
      return { ...stmt, expr: fn(stmt.expr) };
    case "when":
      return { ...stmt, cond: fn(stmt.cond) };
    case "stop":
      return { ...stmt, clock: fn(stmt.clock), en: fn(stmt.en) };
    case "print":
      return { ...stmt, clock: fn(stmt.clock), en: fn(stmt.en), args: stmt.args.map(fn) };
  }
}

/** Rebuilds `stmt` with `fn` applied to each directly nested statement. */
export function mapStmtChildren(stmt: Stmt, fn: StmtMapper): Stmt {
  switch (stmt.kind) {
    case "when":
      return { ...stmt, then: stmt.then.map(fn), else: stmt.else.map(fn) };
    case "block":
      return { ...stmt, stmts: stmt.stmts.map(fn) };
    default:
      return stmt;
  }
}

/** Deep, bottom-up expression rewrite of a whole statement tree. */
export function mapStmtTreeExprs(stmt: Stmt, fn: ExprMapper): Stmt {
  return mapStmtExprs(
    mapStmtChildren(stmt, (s) => mapStmtTreeExprs(s, fn)),
    fn
  );
}

/** Pre-order visit of every statement in `stmts`, including those nested in `when` and `block`. */
export function forEachStmt(stmts: readonly Stmt[], visit: (stmt: Stmt) => void): void {
  for (const stmt of stmts) {
    visit(stmt);
    if (stmt.kind === "when") {
      forEachStmt(stmt.then, visit);
      forEachStmt(stmt.else, visit);
    } else if (stmt.kind === "block") {
      forEachStmt(stmt.stmts, visit);
    }
  }
}

/** Port names followed by every declared name of the body, in declaration order. */
export function declaredNames(module: RegularModule): readonly string[] {
  const out: string[] = module.ports.map((p) => p.name);
  forEachStmt(module.body, (stmt) => {
    switch (stmt.kind) {
      case "wire":
      case "reg":
      case "node":
      case "inst":
      case "mem":
        out.push(stmt.name);
        return;
      default:
        return;
    }
  });
  return out;
}
