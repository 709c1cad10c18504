import type { NodeId } from "./ids.js";
import type { Language } from "./language.js";
import type { LiteralValue } from "./literal.js";
import type { Metadata } from "./metadata.js";
import type { Type } from "./types.js";

/**
 * Links a unified node back to the nodes it was built from.
 *
 * `dynamicNode` and `systemsNode` index into the dynamic and systems graphs.
 * `boundaryEliminated` is monotonic: once true it stays true.
 */
export type CrossMapping = {
  readonly dynamicNode?: NodeId;
  readonly systemsNode?: NodeId;
  readonly pattern: string;
  readonly boundaryEliminated: boolean;
};

export type UnifiedParam = {
  readonly name: string;
  readonly paramType: Type;
  readonly sourceLanguage: Language;
};

export type UnifiedCall = {
  readonly kind: "call";
  readonly id: NodeId;
  readonly targetLanguage: Language;
  readonly callee: string;
  readonly args: readonly UnifiedNode[];
  // Zero-based source positions of arguments left out of `args`.
  readonly omittedArgs?: readonly number[];
  readonly inferredType: Type;
  readonly sourceLanguage: Language;
  readonly crossMapping?: CrossMapping;
  readonly meta: Metadata;
};

export type UnifiedVariable = {
  readonly kind: "variable";
  readonly id: NodeId;
  readonly name: string;
  readonly varType: Type;
  readonly sourceLanguage: Language;
  readonly meta: Metadata;
};

export type UnifiedLiteral = {
  readonly kind: "literal";
  readonly id: NodeId;
  readonly value: LiteralValue;
  readonly litType: Type;
  readonly meta: Metadata;
};

export type UnifiedFunction = {
  readonly kind: "function";
  readonly id: NodeId;
  readonly name: string;
  readonly params: readonly UnifiedParam[];
  readonly returnType: Type;
  readonly body: readonly UnifiedNode[];
  readonly sourceLanguage: Language;
  readonly crossMapping?: CrossMapping;
  readonly meta: Metadata;
};

export type UnifiedModule = {
  readonly kind: "module";
  readonly name: string;
  readonly sourceLanguage: Language;
  readonly declarations: readonly UnifiedNode[];
  readonly meta: Metadata;
};

export type UnifiedNode = UnifiedCall | UnifiedVariable | UnifiedLiteral | UnifiedFunction | UnifiedModule;

export function unifiedNodeId(node: UnifiedNode): NodeId | undefined {
  return node.kind === "module" ? undefined : node.id;
}

/** Call arguments at their source positions; omitted ones are `undefined`. */
export function positionalArgs(call: UnifiedCall): readonly (UnifiedNode | undefined)[] {
  const omitted = new Set(call.omittedArgs ?? []);
  const out: (UnifiedNode | undefined)[] = [];
  let next = 0;
  for (let pos = 0; out.length < call.args.length + omitted.size; pos++) {
    if (omitted.has(pos)) {
      out.push(undefined);
    } else {
      out.push(call.args[next]);
      next++;
    }
  }
  return out;
}

export function unifiedChildren(node: UnifiedNode): readonly UnifiedNode[] {
  switch (node.kind) {
    case "call":
      return node.args;
    case "function":
      return node.body;
    case "module":
      return node.declarations;
    case "variable":
    case "literal":
      return [];
  }
}

/** Pre-order walk over a unified tree. */
export function walkUnified(node: UnifiedNode, visit: (node: UnifiedNode, depth: number) => void, depth = 0): void {
  visit(node, depth);
  for (const child of unifiedChildren(node)) walkUnified(child, visit, depth + 1);
}

export function eliminateBoundary(mapping: CrossMapping): CrossMapping {
  if (mapping.boundaryEliminated) return mapping;
  return Object.freeze({ ...mapping, boundaryEliminated: true });
}
