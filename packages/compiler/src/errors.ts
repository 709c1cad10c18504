import type { Result, SourceLocation } from "@seam/core";
import { err, formatSourceLocation, ok } from "@seam/core";

import type { CompilerDiagnosticCode } from "./diagnostics.js";
import { assertCompilerDiagnosticCode } from "./diagnostics.js";

export class CompileError extends Error {
  readonly code: CompilerDiagnosticCode;
  readonly location?: SourceLocation;

  constructor(code: string, message: string, location?: SourceLocation) {
    assertCompilerDiagnosticCode(code);
    super(message);
    this.code = code;
    this.location = location;
    this.name = "CompileError";
  }
}

export function fail(code: CompilerDiagnosticCode, message: string, location?: SourceLocation): never {
  throw new CompileError(code, message, location);
}

export function formatCompileError(error: CompileError): string {
  const where = error.location ? `${formatSourceLocation(error.location)}: ` : "";
  return `${where}${error.code}: ${error.message}`;
}

/**
 * Runs a converter that reports through `fail` and turns its `CompileError`
 * into an `Err`. Anything else is a bug and propagates.
 */
export function captureCompileError<T>(run: () => T): Result<T, CompileError> {
  try {
    return ok(run());
  } catch (e: unknown) {
    if (e instanceof CompileError) return err(e);
    throw e;
  }
}
