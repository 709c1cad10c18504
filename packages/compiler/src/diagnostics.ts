import type { SourceLocation } from "@seam/core";
import { formatSourceLocation } from "@seam/core";

export type CompilerDiagnosticDomain = "frontend" | "unify" | "optimize" | "codegen" | "registry" | "other";

export type DiagnosticSeverity = "error" | "warning";

type DiagnosticDef = {
  readonly code: string;
  readonly domain: CompilerDiagnosticDomain;
  readonly severity: DiagnosticSeverity;
};

const DEFINITIONS = [
  { code: "SEM1000", domain: "frontend", severity: "error" }, // Unsupported dynamic AST node
  { code: "SEM1001", domain: "frontend", severity: "error" }, // Malformed dynamic AST node
  { code: "SEM1002", domain: "frontend", severity: "error" }, // No dynamic call to unify
  { code: "SEM1010", domain: "frontend", severity: "error" }, // Unsupported systems AST node
  { code: "SEM1011", domain: "frontend", severity: "error" }, // Malformed systems AST node
  { code: "SEM1012", domain: "frontend", severity: "error" }, // No systems function to unify
  { code: "SEM1100", domain: "unify", severity: "error" }, // No pattern matches the name pair
  { code: "SEM1101", domain: "unify", severity: "error" }, // Incompatible node kinds
  { code: "SEM1102", domain: "unify", severity: "error" }, // Unsupported construct
  { code: "SEM1103", domain: "unify", severity: "warning" }, // Argument could not be converted
  { code: "SEM1104", domain: "unify", severity: "warning" }, // Argument count outside pattern arity
  { code: "SEM1200", domain: "optimize", severity: "error" }, // Optimization pass broke an invariant
  { code: "SEM1300", domain: "codegen", severity: "error" }, // Call still crosses a boundary
  { code: "SEM1301", domain: "codegen", severity: "error" }, // No template for pattern
  { code: "SEM1302", domain: "codegen", severity: "error" }, // Node kind cannot be generated
  { code: "SEM1400", domain: "registry", severity: "error" }, // Invalid pattern registry
] as const satisfies readonly DiagnosticDef[];

export type CompilerDiagnosticCode = (typeof DEFINITIONS)[number]["code"];

const BY_CODE: ReadonlyMap<string, DiagnosticDef> = new Map(
  DEFINITIONS.map((d): readonly [string, DiagnosticDef] => [d.code, d])
);

export const COMPILER_DIAGNOSTIC_CODES: readonly CompilerDiagnosticCode[] = Object.freeze(
  DEFINITIONS.map((d) => d.code)
);

export function isCompilerDiagnosticCode(code: string): code is CompilerDiagnosticCode {
  return BY_CODE.has(code);
}

export function assertCompilerDiagnosticCode(code: string): asserts code is CompilerDiagnosticCode {
  if (!isCompilerDiagnosticCode(code)) {
    throw new Error(`Unknown compiler diagnostic code: ${code}`);
  }
}

export function compilerDiagnosticDomain(code: string): CompilerDiagnosticDomain {
  return BY_CODE.get(code)?.domain ?? "other";
}

export function compilerDiagnosticSeverity(code: CompilerDiagnosticCode): DiagnosticSeverity {
  return BY_CODE.get(code)?.severity ?? "error";
}

/** A recoverable finding reported alongside a successful result. */
export type Diagnostic = {
  readonly code: CompilerDiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
};

export function diagnostic(code: CompilerDiagnosticCode, message: string, location?: SourceLocation): Diagnostic {
  return Object.freeze({
    code,
    severity: compilerDiagnosticSeverity(code),
    message,
    ...(location ? { location } : {}),
  });
}

export function formatDiagnostic(d: Diagnostic): string {
  const where = d.location ? `${formatSourceLocation(d.location)}: ` : "";
  return `${where}${d.severity} ${d.code}: ${d.message}`;
}
