import type {
  DynamicCall,
  DynamicNode,
  LiteralValue,
  Result,
  SystemsFunction,
  SystemsNode,
  Type,
  UnifiedCall,
  UnifiedNode,
} from "@seam/core";
import {
  NodeIdAllocator,
  UNKNOWN_TYPE,
  dynamicType,
  err,
  freezeReadonlyArray,
  metadata,
  ok,
} from "@seam/core";

import type { Diagnostic } from "../diagnostics.js";
import { diagnostic } from "../diagnostics.js";
import type { PatternEntry, PatternRegistry } from "../patterns/registry.js";
import { defaultPatternRegistry, findPattern, suggestPatterns } from "../patterns/registry.js";
import type { UnificationError } from "./errors.js";

export type UnifyOptions = {
  readonly registry?: PatternRegistry;
};

export type UnifyOutput = {
  readonly node: UnifiedCall;
  // Recoverable findings: omitted arguments, arity mismatches.
  readonly diagnostics: readonly Diagnostic[];
};

export function dynamicCallName(call: DynamicCall): Result<string, UnificationError> {
  if (call.callee.kind === "variable") return ok(call.callee.name);
  return err({
    kind: "unsupportedConstruct",
    domain: "dynamic",
    nodeKind: `${call.callee.kind} callee`,
    location: call.meta.sourceLocation,
  });
}

function literalType(value: LiteralValue): Type {
  switch (value.kind) {
    case "int":
      return dynamicType({ kind: "int" });
    case "float":
      return dynamicType({ kind: "float" });
    case "str":
      return dynamicType({ kind: "str" });
    case "bool":
      return dynamicType({ kind: "bool" });
    case "none":
      return dynamicType({ kind: "none" });
  }
}

/**
 * Converts dynamic-side arguments into unified nodes. Names keep their
 * spelling and get an unknown type; literals carry over. Anything else is left
 * out, its position recorded in `omitted` and reported as a warning.
 */
export function convertArgs(
  args: readonly DynamicNode[],
  ids: NodeIdAllocator,
  pattern: PatternEntry
): {
  readonly args: readonly UnifiedNode[];
  readonly omitted: readonly number[];
  readonly diagnostics: readonly Diagnostic[];
} {
  const out: UnifiedNode[] = [];
  const omitted: number[] = [];
  const diagnostics: Diagnostic[] = [];
  args.forEach((arg, index) => {
    switch (arg.kind) {
      case "variable":
        out.push(
          Object.freeze({
            kind: "variable",
            id: ids.next(),
            name: arg.name,
            varType: UNKNOWN_TYPE,
            sourceLanguage: "dynamic",
            meta: metadata({ sourceLocation: arg.meta.sourceLocation }),
          })
        );
        return;
      case "literal":
        out.push(
          Object.freeze({
            kind: "literal",
            id: ids.next(),
            value: arg.value,
            litType: literalType(arg.value),
            meta: metadata({ sourceLocation: arg.meta.sourceLocation }),
          })
        );
        return;
      default:
        omitted.push(index);
        diagnostics.push(
          diagnostic(
            "SEM1103",
            `Argument ${index + 1} of '${pattern.dynamicName}' is a ${arg.kind} and was left out of the unified call.`,
            arg.meta.sourceLocation
          )
        );
    }
  });
  return {
    args: freezeReadonlyArray(out),
    omitted: freezeReadonlyArray(omitted),
    diagnostics: freezeReadonlyArray(diagnostics),
  };
}

/**
 * Matches a dynamic-side call against a systems-side function through the
 * pattern registry. Pure: the same inputs always give the same output.
 */
export function unify(
  dynamicCall: DynamicNode,
  systemsFn: SystemsNode,
  options: UnifyOptions = {}
): Result<UnifyOutput, UnificationError> {
  if (dynamicCall.kind !== "call" || systemsFn.kind !== "function") {
    return err({
      kind: "incompatibleNodes",
      dynamicKind: dynamicCall.kind,
      systemsKind: systemsFn.kind,
      location: dynamicCall.meta.sourceLocation,
    });
  }
  return unifyCall(dynamicCall, systemsFn, options.registry ?? defaultPatternRegistry());
}

function unifyCall(
  call: DynamicCall,
  fn: SystemsFunction,
  registry: PatternRegistry
): Result<UnifyOutput, UnificationError> {
  const name = dynamicCallName(call);
  if (!name.ok) return name;

  const entry = findPattern(name.value, fn.name, registry);
  if (!entry) {
    return err({
      kind: "noPatternMatch",
      dynamicName: name.value,
      systemsName: fn.name,
      suggestions: suggestPatterns(name.value, fn.name, registry),
      location: call.meta.sourceLocation,
    });
  }

  const ids = new NodeIdAllocator();
  const id = ids.next();
  const converted = convertArgs(call.args, ids, entry);

  const diagnostics = [...converted.diagnostics];
  const { min, max } = entry.arity;
  if (call.args.length < min || call.args.length > max) {
    const expected = min === max ? `${min}` : `between ${min} and ${max}`;
    diagnostics.push(
      diagnostic(
        "SEM1104",
        `'${entry.dynamicName}' expects ${expected} argument(s), got ${call.args.length}.`,
        call.meta.sourceLocation
      )
    );
  }

  const node: UnifiedCall = Object.freeze({
    kind: "call",
    id,
    targetLanguage: "target",
    callee: entry.callee,
    args: converted.args,
    ...(converted.omitted.length > 0 ? { omittedArgs: converted.omitted } : {}),
    inferredType: entry.resultType,
    sourceLanguage: "dynamic",
    crossMapping: Object.freeze({
      dynamicNode: call.id,
      systemsNode: fn.id,
      pattern: entry.pattern,
      boundaryEliminated: false,
    }),
    meta: metadata({
      sourceLocation: call.meta.sourceLocation,
      patternUsed: entry.pattern,
      debugNotes: [`unified ${entry.dynamicName}() with ${entry.systemsName}() as ${entry.callee}()`],
    }),
  });
  return ok({ node, diagnostics: freezeReadonlyArray(diagnostics) });
}
