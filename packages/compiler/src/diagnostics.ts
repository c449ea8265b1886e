export type CompilerDiagnosticDomain = "config" | "invariant" | "decode" | "other";

const CODES_BY_DOMAIN = {
  config: ["CRN1001", "CRN1002", "CRN1003"],
  invariant: ["CRN2001", "CRN2002", "CRN2003", "CRN2004", "CRN2005", "CRN2006", "CRN2007", "CRN2008"],
  decode: ["CRN3001", "CRN3002"],
} as const;

export type CompilerDiagnosticCode = (typeof CODES_BY_DOMAIN)[keyof typeof CODES_BY_DOMAIN][number];

export const COMPILER_DIAGNOSTIC_CODES: ReadonlySet<string> = new Set<string>([
  ...CODES_BY_DOMAIN.config,
  ...CODES_BY_DOMAIN.invariant,
  ...CODES_BY_DOMAIN.decode,
]);

export function compilerDiagnosticDomain(code: string): CompilerDiagnosticDomain {
  for (const domain of ["config", "invariant", "decode"] as const) {
    const codes: readonly string[] = CODES_BY_DOMAIN[domain];
    if (codes.includes(code)) return domain;
  }
  return "other";
}

export function assertCompilerDiagnosticCode(code: string): asserts code is CompilerDiagnosticCode {
  if (!COMPILER_DIAGNOSTIC_CODES.has(code)) {
    throw new Error(`Unknown compiler diagnostic code: ${code}`);
  }
}

export class CompileError extends Error {
  readonly code: CompilerDiagnosticCode;

  constructor(code: string, message: string) {
    super(message);
    assertCompilerDiagnosticCode(code);
    this.code = code;
    this.name = "CompileError";
  }
}

/** Configuration rejected before any traversal starts (malformed or non-local target). */
export class InvalidAddressError extends CompileError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "InvalidAddressError";
  }
}

/** The input circuit broke an assumption the rename engine relies on. The run is aborted. */
export class InternalError extends CompileError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "InternalError";
  }
}

export function fail(code: string, message: string): never {
  const domain = compilerDiagnosticDomain(code);
  if (domain === "config") throw new InvalidAddressError(code, message);
  if (domain === "invariant") throw new InternalError(code, message);
  throw new CompileError(code, message);
}
