export type GroundType =
  | { readonly kind: "uint"; readonly width?: number }
  | { readonly kind: "sint"; readonly width?: number }
  | { readonly kind: "analog"; readonly width?: number }
  | { readonly kind: "clock" }
  | { readonly kind: "reset" }
  | { readonly kind: "async_reset" };

export type Expr =
  | { readonly kind: "ref"; readonly name: string }
  | { readonly kind: "subfield"; readonly expr: Expr; readonly name: string }
  | { readonly kind: "uint_lit"; readonly value: string; readonly width?: number }
  | { readonly kind: "sint_lit"; readonly value: string; readonly width?: number }
  | {
      readonly kind: "prim";
      readonly op: string;
      readonly args: readonly Expr[];
      readonly consts: readonly number[];
    }
  | { readonly kind: "mux"; readonly cond: Expr; readonly tval: Expr; readonly fval: Expr }
  | { readonly kind: "validif"; readonly cond: Expr; readonly value: Expr };

export type RegReset = {
  readonly signal: Expr;
  readonly init: Expr;
};

export type ReadUnderWrite = "old" | "new" | "undefined";

export type MemDecl = {
  readonly kind: "mem";
  readonly name: string;
  readonly dataType: GroundType;
  readonly depth: number;
  readonly readLatency: number;
  readonly writeLatency: number;
  readonly readers: readonly string[];
  readonly writers: readonly string[];
  readonly readwriters: readonly string[];
  readonly readUnderWrite: ReadUnderWrite;
};

export type InstDecl = {
  readonly kind: "inst";
  readonly name: string;
  readonly module: string;
};

export type Decl =
  | { readonly kind: "wire"; readonly name: string; readonly type: GroundType }
  | {
      readonly kind: "reg";
      readonly name: string;
      readonly type: GroundType;
      readonly clock: Expr;
      readonly reset?: RegReset;
    }
  | { readonly kind: "node"; readonly name: string; readonly value: Expr }
  | InstDecl
  | MemDecl;

export type Stmt =
  | Decl
  | { readonly kind: "connect"; readonly loc: Expr; readonly expr: Expr }
  | { readonly kind: "invalidate"; readonly expr: Expr }
  | {
      readonly kind: "when";
      readonly cond: Expr;
      readonly then: readonly Stmt[];
      readonly else: readonly Stmt[];
    }
  | { readonly kind: "block"; readonly stmts: readonly Stmt[] }
  | { readonly kind: "stop"; readonly clock: Expr; readonly en: Expr; readonly exitCode: number }
  | {
      readonly kind: "print";
      readonly clock: Expr;
      readonly en: Expr;
      readonly format: string;
      readonly args: readonly Expr[];
    }
  | { readonly kind: "skip" };

export type Direction = "input" | "output";

export type Port = {
  readonly name: string;
  readonly direction: Direction;
  readonly type: GroundType;
};

export type ParamValue = string | number;

export type RegularModule = {
  readonly kind: "module";
  readonly name: string;
  readonly ports: readonly Port[];
  readonly body: readonly Stmt[];
};

export type ExternalModule = {
  readonly kind: "extmodule";
  readonly name: string;
  readonly ports: readonly Port[];
  readonly defname: string;
  readonly params: readonly { readonly name: string; readonly value: ParamValue }[];
};

export type Module = RegularModule | ExternalModule;

export type Circuit = {
  readonly main: string;
  readonly modules: readonly Module[];
};

const DECL_KINDS: ReadonlySet<Stmt["kind"]> = new Set(["wire", "reg", "node", "inst", "mem"]);

export function isDecl(stmt: Stmt): stmt is Decl {
  return DECL_KINDS.has(stmt.kind);
}

export function ref(name: string): Expr {
  return { kind: "ref", name };
}

export function subfield(expr: Expr, name: string): Expr {
  return { kind: "subfield", expr, name };
}

export function uintLit(value: number | bigint, width?: number): Expr {
  return width === undefined
    ? { kind: "uint_lit", value: value.toString() }
    : { kind: "uint_lit", value: value.toString(), width };
}

export function uintType(width?: number): GroundType {
  return width === undefined ? { kind: "uint" } : { kind: "uint", width };
}

export function clockType(): GroundType {
  return { kind: "clock" };
}
