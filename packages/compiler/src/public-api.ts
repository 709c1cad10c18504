export type { CompileFailure, CompileOptions, CompileOutput } from "./compile.js";
export { compile, formatCompileFailure } from "./compile.js";
export type { GenerateOptions } from "./codegen/generate.js";
export { DEFAULT_FALLBACK_RECEIVER, extractReceiverName, generate } from "./codegen/generate.js";
export type { CompilerDiagnosticCode, CompilerDiagnosticDomain, Diagnostic, DiagnosticSeverity } from "./diagnostics.js";
export {
  COMPILER_DIAGNOSTIC_CODES,
  compilerDiagnosticDomain,
  compilerDiagnosticSeverity,
  diagnostic,
  formatDiagnostic,
  isCompilerDiagnosticCode,
} from "./diagnostics.js";
export { CompileError, formatCompileError } from "./errors.js";
export type { JsonRecord } from "./json.js";
export { isJsonRecord } from "./json.js";
export type { ExtractedDynamicCall } from "./frontends/dynamic.js";
export { DEFAULT_DYNAMIC_FILE, convertDynamicAst, extractDynamicCall } from "./frontends/dynamic.js";
export { DEFAULT_SYSTEMS_FILE, convertSystemsAst, extractSystemsFunction } from "./frontends/systems.js";
export { parseCType } from "./frontends/c-types.js";
export type { Pass } from "./passes/pass.js";
export { BoundaryEliminationPass, countEliminatedBoundaries } from "./passes/boundary-elimination.js";
export { OptimizationPipeline } from "./passes/pipeline.js";
export type { PatternEntry, PatternRegistry } from "./patterns/registry.js";
export {
  allPatterns,
  defaultPatternRegistry,
  findPattern,
  findPatternById,
  formatPattern,
  loadPatternRegistry,
  parsePatternRegistry,
  suggestPatterns,
} from "./patterns/registry.js";
export { parseTargetTypeText } from "./patterns/type-text.js";
export type { UnificationError } from "./unify/errors.js";
export { formatUnificationError, unificationErrorCode, unificationErrorSummary } from "./unify/errors.js";
export type { UnifyOptions, UnifyOutput } from "./unify/unifier.js";
export { dynamicCallName, unify } from "./unify/unifier.js";
