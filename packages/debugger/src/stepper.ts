import type { Result, UnifiedNode } from "@seam/core";
import { err, ok } from "@seam/core";
import type { PatternRegistry } from "@seam/compiler";
import {
  DEFAULT_DYNAMIC_FILE,
  DEFAULT_SYSTEMS_FILE,
  OptimizationPipeline,
  convertDynamicAst,
  convertSystemsAst,
  countEliminatedBoundaries,
  defaultPatternRegistry,
  extractDynamicCall,
  extractSystemsFunction,
  formatCompileError,
  formatUnificationError,
  generate,
  isJsonRecord,
  unify,
} from "@seam/compiler";

import type { Breakpoint } from "./breakpoints.js";
import { breakpointMatches } from "./breakpoints.js";
import type { Phase, StepPhase } from "./phases.js";
import { nextPhase } from "./phases.js";
import type { PendingError, Transformation, TranspilationState } from "./state.js";
import { initialState } from "./state.js";

export type StepperOptions = {
  // AST dumps as parsed JSON.
  readonly dynamic: unknown;
  readonly systems: unknown;
  readonly dynamicFile?: string;
  readonly systemsFile?: string;
  readonly pipeline?: OptimizationPipeline;
  readonly registry?: PatternRegistry;
  readonly fallbackReceiver?: string;
};

export type StepOutcome =
  | { readonly kind: "idle" }
  | { readonly kind: "blocked"; readonly error: PendingError }
  | { readonly kind: "failed"; readonly error: PendingError }
  | { readonly kind: "advanced"; readonly phase: Phase; readonly transformation: Transformation };

export type ContinueOutcome =
  | {
      readonly kind: "breakpoint";
      readonly breakpoint: Breakpoint;
      readonly index: number;
      readonly transformation: Transformation;
    }
  | { readonly kind: "complete" }
  | { readonly kind: "failed"; readonly error: PendingError }
  | { readonly kind: "blocked"; readonly error: PendingError };

type PhaseWork = {
  readonly patch: Partial<TranspilationState>;
  readonly summary: string;
};

function astTag(source: unknown, key: "_type" | "kind"): string | undefined {
  if (!isJsonRecord(source)) return undefined;
  const tag = source[key];
  return typeof tag === "string" && tag.length > 0 ? tag : undefined;
}

function eliminatedIn(state: TranspilationState): number {
  const tree: UnifiedNode | undefined = state.optimizedHir ?? state.unifiedHir;
  return tree ? countEliminatedBoundaries(tree) : 0;
}

/**
 * Walks the transpilation one phase at a time. Each `step` does the work of
 * entering the next phase; a failed step leaves the phase unchanged and blocks
 * further steps until the error is acknowledged.
 */
export class Stepper {
  #state: TranspilationState;
  readonly #breakpoints: Breakpoint[] = [];
  readonly #pipeline: OptimizationPipeline;
  readonly #registry: PatternRegistry;
  readonly #fallbackReceiver?: string;

  constructor(options: StepperOptions) {
    this.#state = initialState({
      dynamicSource: options.dynamic,
      systemsSource: options.systems,
      dynamicFile: options.dynamicFile ?? DEFAULT_DYNAMIC_FILE,
      systemsFile: options.systemsFile ?? DEFAULT_SYSTEMS_FILE,
    });
    this.#pipeline = options.pipeline ?? OptimizationPipeline.standard();
    this.#registry = options.registry ?? defaultPatternRegistry();
    this.#fallbackReceiver = options.fallbackReceiver;
  }

  get state(): TranspilationState {
    return this.#state;
  }

  get breakpoints(): readonly Breakpoint[] {
    return [...this.#breakpoints];
  }

  /** Adds a breakpoint and returns its index. */
  addBreakpoint(bp: Breakpoint): number {
    this.#breakpoints.push(bp);
    return this.#breakpoints.length - 1;
  }

  clearBreakpoint(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.#breakpoints.length) return false;
    this.#breakpoints.splice(index, 1);
    return true;
  }

  /** Clears a pending error so the next step retries. Returns whether there was one. */
  acknowledgeError(): boolean {
    if (!this.#state.error) return false;
    const { error: _cleared, ...rest } = this.#state;
    this.#state = Object.freeze(rest);
    return true;
  }

  step(): StepOutcome {
    const state = this.#state;
    if (state.error) return { kind: "blocked", error: state.error };
    if (state.phase === "Complete") return { kind: "idle" };

    const target = nextPhase(state.phase);
    const work = this.work(target, state);
    if (!work.ok) {
      const error: PendingError = Object.freeze({ phase: target, message: work.error });
      this.#state = Object.freeze({ ...state, error });
      return { kind: "failed", error };
    }

    const merged: TranspilationState = { ...state, ...work.value.patch };
    const transformation: Transformation = Object.freeze({
      step: state.stepCount + 1,
      from: state.phase,
      to: target,
      summary: work.value.summary,
      boundariesEliminated: Math.max(0, eliminatedIn(merged) - eliminatedIn(state)),
    });
    this.#state = Object.freeze({
      ...merged,
      phase: target,
      stepCount: transformation.step,
      history: Object.freeze([...state.history, transformation]),
    });
    return { kind: "advanced", phase: target, transformation };
  }

  /** Steps until completion, an error, or a breakpoint on the transition just made. */
  continueUntilBreakpoint(): ContinueOutcome {
    for (;;) {
      const outcome = this.step();
      switch (outcome.kind) {
        case "idle":
          return { kind: "complete" };
        case "blocked":
        case "failed":
          return outcome;
        case "advanced": {
          const index = this.#breakpoints.findIndex((bp) => breakpointMatches(bp, outcome.transformation));
          const breakpoint = this.#breakpoints[index];
          if (breakpoint) return { kind: "breakpoint", breakpoint, index, transformation: outcome.transformation };
          if (outcome.phase === "Complete") return { kind: "complete" };
        }
      }
    }
  }

  private work(phase: StepPhase, state: TranspilationState): Result<PhaseWork, string> {
    switch (phase) {
      case "DynamicParsed": {
        const tag = astTag(state.dynamicSource, "_type");
        if (!tag) return err(`${state.dynamicFile}: expected a Python AST dump (an object with '_type').`);
        return ok({ patch: {}, summary: `Dynamic AST accepted (${tag})` });
      }
      case "DynamicHIR": {
        const hir = convertDynamicAst(state.dynamicSource, state.dynamicFile);
        if (!hir.ok) return err(formatCompileError(hir.error));
        return ok({
          patch: { dynamicHir: hir.value },
          summary: `Dynamic HIR built: module '${hir.value.name}' with ${hir.value.body.length} top-level node(s)`,
        });
      }
      case "SystemsParsed": {
        const tag = astTag(state.systemsSource, "kind");
        if (!tag) return err(`${state.systemsFile}: expected a clang AST dump (an object with 'kind').`);
        return ok({ patch: {}, summary: `Systems AST accepted (${tag})` });
      }
      case "SystemsHIR": {
        const hir = convertSystemsAst(state.systemsSource, state.systemsFile);
        if (!hir.ok) return err(formatCompileError(hir.error));
        return ok({
          patch: { systemsHir: hir.value },
          summary: `Systems HIR built: ${hir.value.declarations.length} function(s)`,
        });
      }
      case "UnifiedHIR":
        return this.unifyPhase(state);
      case "Optimized": {
        if (!state.unifiedHir) return err("Unified HIR is not available.");
        const optimized = this.#pipeline.run(state.unifiedHir);
        if (!optimized.ok) return err(formatCompileError(optimized.error));
        const passes = this.#pipeline.passNames.join(", ");
        return ok({
          patch: { optimizedHir: optimized.value },
          summary: `Ran ${this.#pipeline.passCount} pass(es)${passes.length > 0 ? ` (${passes})` : ""}`,
        });
      }
      case "Generated": {
        if (!state.optimizedHir) return err("Optimized HIR is not available.");
        const code = generate(state.optimizedHir, {
          registry: this.#registry,
          ...(this.#fallbackReceiver !== undefined ? { fallbackReceiver: this.#fallbackReceiver } : {}),
        });
        if (!code.ok) return err(formatCompileError(code.error));
        return ok({ patch: { generatedText: code.value }, summary: `Generated: ${code.value.split("\n")[0] ?? ""}` });
      }
      case "Complete":
        return ok({ patch: {}, summary: "Transpilation complete" });
    }
  }

  private unifyPhase(state: TranspilationState): Result<PhaseWork, string> {
    if (!state.dynamicHir || !state.systemsHir) return err("Dynamic and systems HIR are not available.");
    const call = extractDynamicCall(state.dynamicHir);
    if (!call.ok) return err(formatCompileError(call.error));
    const fn = extractSystemsFunction(state.systemsHir);
    if (!fn.ok) return err(formatCompileError(fn.error));

    const unified = unify(call.value.call, fn.value, { registry: this.#registry });
    if (!unified.ok) return err(formatUnificationError(unified.error, this.#registry.documentation));
    const node = unified.value.node;
    return ok({
      patch: {
        unifiedHir: node,
        diagnostics: Object.freeze([...state.diagnostics, ...unified.value.diagnostics]),
      },
      summary: `Unified ${fn.value.name}() as ${node.callee}() using pattern '${node.meta.patternUsed ?? ""}'`,
    });
  }
}
