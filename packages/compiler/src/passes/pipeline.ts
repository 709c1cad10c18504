import type { NodeId, Result, UnifiedNode } from "@seam/core";
import { err, ok, walkUnified } from "@seam/core";

import { CompileError } from "../errors.js";
import { BoundaryEliminationPass } from "./boundary-elimination.js";
import type { Pass } from "./pass.js";

function boundaryStates(node: UnifiedNode): ReadonlyMap<NodeId, boolean> {
  const states = new Map<NodeId, boolean>();
  walkUnified(node, (n) => {
    if (n.kind === "call" && n.crossMapping) states.set(n.id, n.crossMapping.boundaryEliminated);
  });
  return states;
}

/**
 * Runs passes in registration order. Stops at the first failing pass, and
 * fails with SEM1200 if a pass reverts an eliminated boundary.
 */
export class OptimizationPipeline {
  readonly #passes: Pass[] = [];

  static standard(): OptimizationPipeline {
    const pipeline = new OptimizationPipeline();
    pipeline.addPass(new BoundaryEliminationPass());
    return pipeline;
  }

  addPass(pass: Pass): this {
    this.#passes.push(pass);
    return this;
  }

  get passCount(): number {
    return this.#passes.length;
  }

  get passNames(): readonly string[] {
    return this.#passes.map((p) => p.name);
  }

  run(node: UnifiedNode): Result<UnifiedNode, CompileError> {
    let current = node;
    for (const pass of this.#passes) {
      const before = boundaryStates(current);
      const next = pass.apply(current);
      if (!next.ok) return next;
      for (const [id, eliminated] of boundaryStates(next.value)) {
        if (before.get(id) === true && !eliminated) {
          return err(
            new CompileError(
              "SEM1200",
              `Pass '${pass.name}' reverted the eliminated boundary of call #${id}.`,
              current.meta.sourceLocation
            )
          );
        }
      }
      current = next.value;
    }
    return ok(current);
  }
}
