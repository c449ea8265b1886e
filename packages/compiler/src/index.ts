export type {
  Circuit,
  Decl,
  Direction,
  Expr,
  ExternalModule,
  GroundType,
  InstDecl,
  MemDecl,
  ParamValue,
  ReadUnderWrite,
  RegReset,
  Module,
  Port,
  RegularModule,
  Stmt,
} from "./ir/circuit.js";
export { isDecl, ref, subfield, uintLit, uintType, clockType } from "./ir/circuit.js";
export type { ExprMapper, StmtMapper } from "./ir/map.js";
export { declaredNames, forEachStmt, mapExprChildren, mapStmtChildren, mapStmtExprs, mapStmtTreeExprs } from "./ir/map.js";
export type { CircuitTarget, InstanceStep, InstanceTarget, ModuleTarget, ReferenceTarget, Target } from "./ir/targets.js";
export {
  circuitTarget,
  fieldOf,
  instanceTarget,
  instOf,
  isLocal,
  moduleOf,
  moduleTarget,
  parseTarget,
  referenceTarget,
  refOf,
  serializeTarget,
  targetKey,
  targetsEqual,
  terminalName,
  withTerminalName,
  isIdentifier,
  ofModuleTarget,
} from "./ir/targets.js";
export { decodeCircuit, decodeExpr, decodeStmt } from "./ir/decode.js";
export { emitExpr, writeCircuit } from "./ir/write.js";
export type { InstanceEdge } from "./analysis/instance-graph.js";
export { instancesOf, leafToRootOrder, moduleMap } from "./analysis/instance-graph.js";
export type { CompilerDiagnosticCode, CompilerDiagnosticDomain } from "./diagnostics.js";
export { CompileError, InternalError, InvalidAddressError } from "./diagnostics.js";
export { Namespace } from "./rename/namespace.js";
export type { RenameLedgerJson } from "./rename/ledger.js";
export { RenameLedger } from "./rename/ledger.js";
export { SkipSet, createSkipSet, parseSkipSet } from "./rename/skips.js";
export type { InstanceBinding } from "./rename/instance-map.js";
export { InstanceMap } from "./rename/instance-map.js";
export type { ManipulateNamesOptions, ManipulateRule, ModuleOrder, RenamePass } from "./rename/manipulate-names.js";
export { createRenamePass, manipulateNames } from "./rename/manipulate-names.js";
export type { RuleName, RuleSpec } from "./rename/rules.js";
export {
  RULE_NAMES,
  VERILOG_KEYWORDS,
  addPrefix,
  isRuleName,
  lowerCaseNames,
  lowerCasePass,
  passFromSpec,
  removeKeywordCollisions,
  upperCaseNames,
  upperCasePass,
  verilogRename,
} from "./rename/rules.js";
