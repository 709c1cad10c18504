import type { Phase } from "./phases.js";
import type { Transformation } from "./state.js";

export type Breakpoint =
  | { readonly kind: "boundaryElimination" }
  // `name` is the spelling the user typed; `phase` is what it resolved to.
  | { readonly kind: "phase"; readonly name: string; readonly phase: Phase }
  | { readonly kind: "function"; readonly name: string };

export function formatBreakpoint(bp: Breakpoint): string {
  switch (bp.kind) {
    case "boundaryElimination":
      return "Boundary Elimination";
    case "phase":
      return `Phase: ${bp.name}`;
    case "function":
      return `Function: ${bp.name}`;
  }
}

/**
 * Whether `bp` fires on the transition that just completed. Function
 * breakpoints are accepted but never fire: steps are per phase, not per
 * function.
 */
export function breakpointMatches(bp: Breakpoint, transition: Transformation): boolean {
  switch (bp.kind) {
    case "boundaryElimination":
      return transition.boundariesEliminated > 0;
    case "phase":
      return transition.to === bp.phase;
    case "function":
      return false;
  }
}
