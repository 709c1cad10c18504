import type { Result, UnifiedNode } from "@seam/core";
import { eliminateBoundary, freezeReadonlyArray, ok, withDebugNote } from "@seam/core";

import type { CompileError } from "../errors.js";
import type { Pass } from "./pass.js";

function eliminate(node: UnifiedNode): UnifiedNode {
  switch (node.kind) {
    case "call": {
      const args = freezeReadonlyArray(node.args.map(eliminate));
      const mapping = node.crossMapping;
      if (!mapping || mapping.boundaryEliminated) {
        return args.every((a, i) => a === node.args[i]) ? node : Object.freeze({ ...node, args });
      }
      return Object.freeze({
        ...node,
        targetLanguage: "target",
        args,
        crossMapping: eliminateBoundary(mapping),
        meta: withDebugNote(node.meta, `boundary eliminated for ${mapping.pattern}`),
      });
    }
    case "function": {
      const body = freezeReadonlyArray(node.body.map(eliminate));
      return body.every((b, i) => b === node.body[i]) ? node : Object.freeze({ ...node, body });
    }
    case "module": {
      const declarations = freezeReadonlyArray(node.declarations.map(eliminate));
      return declarations.every((d, i) => d === node.declarations[i]) ? node : Object.freeze({ ...node, declarations });
    }
    case "variable":
    case "literal":
      return node;
  }
}

/**
 * Marks every unified call that still crosses the dynamic/systems boundary as a
 * pure target-language call.
 */
export class BoundaryEliminationPass implements Pass {
  readonly name = "BoundaryElimination";

  apply(node: UnifiedNode): Result<UnifiedNode, CompileError> {
    return ok(eliminate(node));
  }
}

export function countEliminatedBoundaries(node: UnifiedNode): number {
  const own = node.kind === "call" && node.crossMapping?.boundaryEliminated === true ? 1 : 0;
  switch (node.kind) {
    case "call":
      return own + node.args.reduce((n, a) => n + countEliminatedBoundaries(a), 0);
    case "function":
      return node.body.reduce((n, b) => n + countEliminatedBoundaries(b), 0);
    case "module":
      return node.declarations.reduce((n, d) => n + countEliminatedBoundaries(d), 0);
    case "variable":
    case "literal":
      return 0;
  }
}
