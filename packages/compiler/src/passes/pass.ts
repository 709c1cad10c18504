import type { Result, UnifiedNode } from "@seam/core";

import type { CompileError } from "../errors.js";

/**
 * One rewrite over a unified tree. Passes never mutate their input and never
 * turn an eliminated boundary back into a pending one.
 */
export interface Pass {
  readonly name: string;
  apply(node: UnifiedNode): Result<UnifiedNode, CompileError>;
}
