import type { DynamicNode, Result, SystemsNode, UnifiedNode } from "@seam/core";
import { err, ok } from "@seam/core";

import type { GenerateOptions } from "./codegen/generate.js";
import { generate } from "./codegen/generate.js";
import type { Diagnostic } from "./diagnostics.js";
import type { CompileError } from "./errors.js";
import { formatCompileError } from "./errors.js";
import { extractDynamicCall } from "./frontends/dynamic.js";
import { extractSystemsFunction } from "./frontends/systems.js";
import { OptimizationPipeline } from "./passes/pipeline.js";
import type { PatternRegistry } from "./patterns/registry.js";
import { defaultPatternRegistry } from "./patterns/registry.js";
import type { UnificationError } from "./unify/errors.js";
import { formatUnificationError } from "./unify/errors.js";
import { unify } from "./unify/unifier.js";

export type CompileOptions = {
  readonly dynamic: DynamicNode;
  readonly systems: SystemsNode;
  readonly fallbackReceiver?: string;
  readonly pipeline?: OptimizationPipeline;
  readonly registry?: PatternRegistry;
};

export type CompileOutput = {
  readonly unified: UnifiedNode;
  readonly optimized: UnifiedNode;
  readonly code: string;
  readonly diagnostics: readonly Diagnostic[];
};

export type CompileFailure =
  | { readonly stage: "extract" | "optimize" | "generate"; readonly error: CompileError }
  | { readonly stage: "unify"; readonly error: UnificationError };

/**
 * extract → unify → optimize → generate. The generated code is the target
 * expression for the extracted call.
 */
export function compile(options: CompileOptions): Result<CompileOutput, CompileFailure> {
  const registry = options.registry ?? defaultPatternRegistry();

  const call = extractDynamicCall(options.dynamic);
  if (!call.ok) return err({ stage: "extract", error: call.error });
  const fn = extractSystemsFunction(options.systems);
  if (!fn.ok) return err({ stage: "extract", error: fn.error });

  const unified = unify(call.value.call, fn.value, { registry });
  if (!unified.ok) return err({ stage: "unify", error: unified.error });

  const pipeline = options.pipeline ?? OptimizationPipeline.standard();
  const optimized = pipeline.run(unified.value.node);
  if (!optimized.ok) return err({ stage: "optimize", error: optimized.error });

  const generateOptions: GenerateOptions = {
    registry,
    ...(options.fallbackReceiver !== undefined ? { fallbackReceiver: options.fallbackReceiver } : {}),
  };
  const code = generate(optimized.value, generateOptions);
  if (!code.ok) return err({ stage: "generate", error: code.error });

  return ok({
    unified: unified.value.node,
    optimized: optimized.value,
    code: code.value,
    diagnostics: unified.value.diagnostics,
  });
}

export function formatCompileFailure(failure: CompileFailure, registry?: PatternRegistry): string {
  if (failure.stage === "unify") {
    return formatUnificationError(failure.error, (registry ?? defaultPatternRegistry()).documentation);
  }
  return formatCompileError(failure.error);
}
