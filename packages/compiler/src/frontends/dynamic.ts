import { basename, extname } from "node:path";

import type {
  DynamicCall,
  DynamicFunction,
  DynamicModule,
  DynamicNode,
  Result,
  SourceLocation,
} from "@seam/core";
import { NodeIdAllocator, err, freezeReadonlyArray, literalFromJson, metadata, ok, sourceLocation } from "@seam/core";

import { CompileError, captureCompileError, fail } from "../errors.js";
import type { JsonRecord } from "../json.js";
import { asArray, asRecord, asString, isJsonRecord } from "../json.js";

export const DEFAULT_DYNAMIC_FILE = "<dynamic>";

function moduleName(file: string): string {
  if (file === DEFAULT_DYNAMIC_FILE) return "main";
  const base = basename(file, extname(file));
  return base.length > 0 ? base : "main";
}

class DynamicConverter {
  readonly #ids = new NodeIdAllocator();

  constructor(private readonly file: string) {}

  private location(raw: JsonRecord): SourceLocation | undefined {
    const line = raw.lineno;
    const col = raw.col_offset;
    if (typeof line !== "number" || typeof col !== "number") return undefined;
    return sourceLocation(this.file, line, col + 1, "dynamic");
  }

  private malformed(loc: SourceLocation | undefined): (message: string) => never {
    return (message) => fail("SEM1001", message, loc);
  }

  private record(value: unknown, label: string): { readonly raw: JsonRecord; readonly type: string } {
    const raw = asRecord(value, label, this.malformed(undefined));
    const type = asString(raw._type, `${label}._type`, this.malformed(this.location(raw)));
    return { raw, type };
  }

  module(value: unknown): DynamicModule {
    const { raw, type } = this.record(value, "root");
    if (type !== "Module") fail("SEM1001", `Expected a Module at the root, found '${type}'.`, this.location(raw));
    const body = asArray(raw.body, "Module.body", this.malformed(undefined)).map((s) => this.statement(s));
    return Object.freeze({
      kind: "module",
      name: moduleName(this.file),
      body: freezeReadonlyArray(body),
      meta: metadata(),
    });
  }

  private statement(value: unknown): DynamicNode {
    const { raw, type } = this.record(value, "statement");
    const loc = this.location(raw);
    switch (type) {
      case "FunctionDef":
        return this.functionDef(raw, loc);
      case "Return": {
        const id = this.#ids.next();
        const returned = raw.value === null || raw.value === undefined ? undefined : this.expression(raw.value);
        return Object.freeze({
          kind: "return",
          id,
          ...(returned ? { value: returned } : {}),
          meta: metadata({ sourceLocation: loc }),
        });
      }
      case "Expr":
        return this.expression(raw.value);
      default:
        return fail("SEM1000", `Unsupported dynamic statement '${type}'.`, loc);
    }
  }

  private functionDef(raw: JsonRecord, loc: SourceLocation | undefined): DynamicFunction {
    const onFail = this.malformed(loc);
    const id = this.#ids.next();
    const name = asString(raw.name, "FunctionDef.name", onFail);
    const args = asRecord(raw.args, `FunctionDef '${name}'.args`, onFail);
    const params = asArray(args.args, `FunctionDef '${name}'.args.args`, onFail).map((p, i) =>
      asString(isJsonRecord(p) ? p.arg : undefined, `FunctionDef '${name}' parameter ${i + 1}`, onFail)
    );
    const body = asArray(raw.body, `FunctionDef '${name}'.body`, onFail).map((s) => this.statement(s));
    return Object.freeze({
      kind: "function",
      id,
      name,
      params: freezeReadonlyArray(params),
      body: freezeReadonlyArray(body),
      meta: metadata({ sourceLocation: loc }),
    });
  }

  private expression(value: unknown): DynamicNode {
    const { raw, type } = this.record(value, "expression");
    const loc = this.location(raw);
    switch (type) {
      case "Call":
        return this.call(raw, loc);
      case "Name":
        return Object.freeze({
          kind: "variable",
          id: this.#ids.next(),
          name: asString(raw.id, "Name.id", this.malformed(loc)),
          meta: metadata({ sourceLocation: loc }),
        });
      case "Constant": {
        const typeName =
          raw._value_type === undefined
            ? undefined
            : asString(raw._value_type, "Constant._value_type", this.malformed(loc));
        const literal = literalFromJson(raw.value, typeName);
        if (!literal.ok) return fail("SEM1000", literal.error, loc);
        return Object.freeze({
          kind: "literal",
          id: this.#ids.next(),
          value: Object.freeze(literal.value),
          meta: metadata({ sourceLocation: loc }),
        });
      }
      default:
        return fail("SEM1000", `Unsupported dynamic expression '${type}'.`, loc);
    }
  }

  // `recv.method(a, b)` is read as `method(recv, a, b)`.
  private call(raw: JsonRecord, loc: SourceLocation | undefined): DynamicCall {
    const onFail = this.malformed(loc);
    const id = this.#ids.next();
    if (Array.isArray(raw.keywords) && raw.keywords.length > 0) {
      fail("SEM1000", "Keyword arguments are not supported.", loc);
    }
    const func = this.record(raw.func, "Call.func");
    let callee: DynamicNode;
    const receiver: DynamicNode[] = [];
    if (func.type === "Attribute") {
      const funcLoc = this.location(func.raw);
      const method = asString(func.raw.attr, "Attribute.attr", this.malformed(funcLoc));
      receiver.push(this.expression(func.raw.value));
      callee = Object.freeze({
        kind: "variable",
        id: this.#ids.next(),
        name: method,
        meta: metadata({ sourceLocation: funcLoc }),
      });
    } else {
      callee = this.expression(raw.func);
    }
    const args = asArray(raw.args, "Call.args", onFail).map((a) => this.expression(a));
    return Object.freeze({
      kind: "call",
      id,
      callee,
      args: freezeReadonlyArray([...receiver, ...args]),
      meta: metadata({ sourceLocation: loc }),
    });
  }
}

/**
 * Converts a Python `ast` JSON dump (nodes tagged with `_type`) into the
 * dynamic HIR. Ids are assigned in document order, starting at 1.
 */
export function convertDynamicAst(json: unknown, file: string = DEFAULT_DYNAMIC_FILE): Result<DynamicModule, CompileError> {
  return captureCompileError(() => new DynamicConverter(file).module(json));
}

export type ExtractedDynamicCall = {
  readonly call: DynamicCall;
  // The function whose return value the call is, when there is one.
  readonly enclosing?: DynamicFunction;
};

function firstCall(body: readonly DynamicNode[]): DynamicCall | undefined {
  for (const node of body) {
    if (node.kind === "return" && node.value?.kind === "call") return node.value;
  }
  for (const node of body) {
    if (node.kind === "call") return node;
  }
  return undefined;
}

/**
 * The call to unify: the first function's first returned call (or first call
 * statement), otherwise the first top-level call.
 */
export function extractDynamicCall(node: DynamicNode): Result<ExtractedDynamicCall, CompileError> {
  if (node.kind === "call") return ok({ call: node });
  if (node.kind === "function") {
    const call = firstCall(node.body);
    if (call) return ok({ call, enclosing: node });
  }
  if (node.kind === "module") {
    const fn = node.body.find((n): n is DynamicFunction => n.kind === "function");
    const inFunction = fn ? firstCall(fn.body) : undefined;
    if (fn && inFunction) return ok({ call: inFunction, enclosing: fn });
    const topLevel = firstCall(node.body);
    if (topLevel) return ok({ call: topLevel });
  }
  return err(
    new CompileError(
      "SEM1002",
      `No call found in the dynamic ${node.kind}; expected a function returning a call or a top-level call.`,
      node.meta.sourceLocation
    )
  );
}
