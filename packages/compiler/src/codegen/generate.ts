import type { LiteralValue, Result, Type, UnifiedCall, UnifiedFunction, UnifiedNode } from "@seam/core";
import { err, formatLiteral, formatType, ok, positionalArgs } from "@seam/core";

import { CompileError } from "../errors.js";
import type { PatternRegistry } from "../patterns/registry.js";
import { defaultPatternRegistry, findPatternById } from "../patterns/registry.js";
import type { RustExpr, RustItem, RustStmt, RustType } from "../rust/ir.js";
import { identExpr, pathExpr, pathType, unitType } from "../rust/ir.js";
import { emitExpr, writeRustProgram } from "../rust/write.js";

export const DEFAULT_FALLBACK_RECEIVER = "x";

export type GenerateOptions = {
  readonly fallbackReceiver?: string;
  readonly registry?: PatternRegistry;
  readonly header?: readonly string[];
};

type Context = {
  readonly fallbackReceiver: string;
  readonly registry: PatternRegistry;
};

/**
 * The receiver of a method-style call: the first argument when it is a plain
 * name, otherwise the fallback identifier.
 */
export function extractReceiverName(
  args: readonly (UnifiedNode | undefined)[],
  fallback: string = DEFAULT_FALLBACK_RECEIVER
): string {
  const first = args[0];
  if (first && first.kind === "variable" && first.name.length > 0) return first.name;
  return fallback;
}

function literalExpr(value: LiteralValue): RustExpr {
  switch (value.kind) {
    case "int":
    case "float":
      return { kind: "number", text: formatLiteral(value) };
    case "str":
      return { kind: "string", value: value.value };
    case "bool":
      return { kind: "bool", value: value.value };
    case "none":
      return pathExpr(["None"]);
  }
}

function slotExpr(slot: string, arg: UnifiedNode | undefined, ctx: Context): Result<RustExpr, CompileError> {
  const borrow = slot.startsWith("&");
  const placeholder = borrow ? slot.slice(1) : slot;
  let value: RustExpr = identExpr(placeholder);
  if (arg?.kind === "variable") value = identExpr(arg.name);
  else if (arg?.kind === "literal") value = literalExpr(arg.value);
  else if (arg?.kind === "call") {
    const nested = callExpr(arg, ctx);
    if (!nested.ok) return nested;
    value = nested.value;
  }
  return ok(borrow ? { kind: "borrow", expr: value } : value);
}

function callExpr(call: UnifiedCall, ctx: Context): Result<RustExpr, CompileError> {
  const mapping = call.crossMapping;
  if (!mapping || !mapping.boundaryEliminated) {
    return err(
      new CompileError(
        "SEM1300",
        `Call to '${call.callee}' still crosses the dynamic/systems boundary; run the optimizer first.`,
        call.meta.sourceLocation
      )
    );
  }
  const entry = findPatternById(mapping.pattern, ctx.registry);
  if (!entry) {
    return err(new CompileError("SEM1301", `No template registered for pattern '${mapping.pattern}'.`, call.meta.sourceLocation));
  }

  const source = positionalArgs(call);
  const args: RustExpr[] = [];
  for (const [i, slot] of entry.template.entries()) {
    const arg = slotExpr(slot, source[i + 1], ctx);
    if (!arg.ok) return arg;
    args.push(arg.value);
  }
  return ok({
    kind: "method_call",
    receiver: identExpr(extractReceiverName(source, ctx.fallbackReceiver)),
    method: entry.method,
    args,
  });
}

function rustTypeOf(t: Type): RustType {
  switch (t.domain) {
    case "unknown":
      return { kind: "infer" };
    case "generic":
      return pathType([t.name]);
    case "function":
      return { kind: "infer" };
    case "dynamic":
      if (t.type.kind === "list") return pathType(["Vec"], [rustTypeOf(t.type.element)]);
      if (t.type.kind === "dict") return pathType(["HashMap"], [rustTypeOf(t.type.key), rustTypeOf(t.type.value)]);
      return { kind: "infer" };
    case "systems":
      return { kind: "infer" };
    case "target":
      switch (t.type.kind) {
        case "unit":
          return unitType();
        case "reference":
          return { kind: "ref", mut: t.type.mutable, inner: rustTypeOf(t.type.inner) };
        case "tuple":
          return { kind: "tuple", elements: t.type.elements.map(rustTypeOf) };
        case "vec":
          return pathType(["Vec"], [rustTypeOf(t.type.element)]);
        case "option":
          return pathType(["Option"], [rustTypeOf(t.type.inner)]);
        case "hashMap":
          return pathType(["HashMap"], [rustTypeOf(t.type.key), rustTypeOf(t.type.value)]);
        case "result":
          return pathType(["Result"], [rustTypeOf(t.type.ok), rustTypeOf(t.type.err)]);
        case "shared":
          return pathType([t.type.atomic ? "Arc" : "Rc"], [rustTypeOf(t.type.inner)]);
        default:
          return pathType([formatType(t)]);
      }
  }
}

function collectImports(ty: RustType, into: Set<string>): void {
  switch (ty.kind) {
    case "ref":
      collectImports(ty.inner, into);
      return;
    case "tuple":
      for (const e of ty.elements) collectImports(e, into);
      return;
    case "path": {
      const [head] = ty.path.segments;
      if (head === "HashMap") into.add("std::collections::HashMap");
      if (head === "Rc") into.add("std::rc::Rc");
      if (head === "Arc") into.add("std::sync::Arc");
      for (const a of ty.args) collectImports(a, into);
      return;
    }
    case "unit":
    case "infer":
      return;
  }
}

function bodyExpr(node: UnifiedNode, ctx: Context): Result<RustExpr, CompileError> {
  switch (node.kind) {
    case "call":
      return callExpr(node, ctx);
    case "variable":
      return ok(identExpr(node.name));
    case "literal":
      return ok(literalExpr(node.value));
    case "function":
    case "module":
      return err(
        new CompileError("SEM1302", `A ${node.kind} cannot appear inside a function body.`, node.meta.sourceLocation)
      );
  }
}

function functionItem(fn: UnifiedFunction, ctx: Context): Result<RustItem, CompileError> {
  const ret = rustTypeOf(fn.returnType);
  const body: RustStmt[] = [];
  for (const [i, node] of fn.body.entries()) {
    const expr = bodyExpr(node, ctx);
    if (!expr.ok) return expr;
    const last = i === fn.body.length - 1;
    body.push(last && ret.kind !== "unit" ? { kind: "tail", expr: expr.value } : { kind: "expr", expr: expr.value });
  }
  return ok({
    kind: "fn",
    name: fn.name,
    params: fn.params.map((p) => ({ name: p.name, type: rustTypeOf(p.paramType) })),
    ret,
    body,
  });
}

function programText(functions: readonly UnifiedFunction[], ctx: Context, header?: readonly string[]): Result<string, CompileError> {
  const items: RustItem[] = [];
  const imports = new Set<string>();
  for (const fn of functions) {
    const item = functionItem(fn, ctx);
    if (!item.ok) return item;
    if (item.value.kind === "fn") {
      collectImports(item.value.ret, imports);
      for (const p of item.value.params) collectImports(p.type, imports);
    }
    items.push(item.value);
  }
  const uses: RustItem[] = [...imports].sort().map((path): RustItem => ({ kind: "use", path: { segments: path.split("::") } }));
  return ok(writeRustProgram({ kind: "program", items: [...uses, ...items] }, { header }));
}

/**
 * Renders an optimized unified node as Rust source text. A call renders as a
 * single expression; a function or module renders as items.
 */
export function generate(node: UnifiedNode, options: GenerateOptions = {}): Result<string, CompileError> {
  const ctx: Context = {
    fallbackReceiver: options.fallbackReceiver ?? DEFAULT_FALLBACK_RECEIVER,
    registry: options.registry ?? defaultPatternRegistry(),
  };
  switch (node.kind) {
    case "call": {
      const expr = callExpr(node, ctx);
      return expr.ok ? ok(emitExpr(expr.value)) : expr;
    }
    case "function":
      return programText([node], ctx, options.header);
    case "module": {
      const functions: UnifiedFunction[] = [];
      for (const decl of node.declarations) {
        if (decl.kind !== "function") {
          return err(
            new CompileError("SEM1302", `Module '${node.name}' may only declare functions, found a ${decl.kind}.`, decl.meta.sourceLocation)
          );
        }
        functions.push(decl);
      }
      return programText(functions, ctx, options.header);
    }
    case "variable":
    case "literal":
      return err(
        new CompileError("SEM1302", `A standalone ${node.kind} cannot be generated.`, node.meta.sourceLocation)
      );
  }
}
