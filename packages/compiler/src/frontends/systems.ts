import type {
  LiteralValue,
  Result,
  SourceLocation,
  SystemsFunction,
  SystemsNode,
  SystemsParam,
  SystemsTranslationUnit,
} from "@seam/core";
import { NodeIdAllocator, err, freezeReadonlyArray, metadata, ok, sourceLocation } from "@seam/core";

import { CompileError, captureCompileError, fail } from "../errors.js";
import type { JsonRecord } from "../json.js";
import { asArray, asRecord, asString, isJsonRecord } from "../json.js";
import { parseCType } from "./c-types.js";

export const DEFAULT_SYSTEMS_FILE = "<systems>";

type ResolvedLoc = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly included: boolean;
};

/**
 * clang's JSON dump writes `file` and `line` only when they change from the
 * previously printed location, so positions are resolved in one pass over the
 * whole tree, in print order (`loc`, then `range.begin`, then `range.end`).
 */
class LocationTable {
  #file = "";
  #line = 0;
  #included = false;
  readonly #byNode = new WeakMap<JsonRecord, ResolvedLoc>();

  constructor(root: unknown) {
    this.visit(root);
  }

  get(node: JsonRecord): ResolvedLoc | undefined {
    return this.#byNode.get(node);
  }

  private bare(loc: JsonRecord): ResolvedLoc | undefined {
    if (typeof loc.file === "string") {
      this.#file = loc.file;
      this.#included = isJsonRecord(loc.includedFrom);
    }
    if (typeof loc.line === "number") this.#line = loc.line;
    if (typeof loc.col !== "number" || this.#line === 0) return undefined;
    return { file: this.#file, line: this.#line, column: loc.col, included: this.#included };
  }

  private location(value: unknown): ResolvedLoc | undefined {
    if (!isJsonRecord(value)) return undefined;
    if (isJsonRecord(value.spellingLoc) || isJsonRecord(value.expansionLoc)) {
      if (isJsonRecord(value.spellingLoc)) this.bare(value.spellingLoc);
      return isJsonRecord(value.expansionLoc) ? this.bare(value.expansionLoc) : undefined;
    }
    return this.bare(value);
  }

  private visit(value: unknown): void {
    if (Array.isArray(value)) {
      for (const item of value) this.visit(item);
      return;
    }
    if (!isJsonRecord(value)) return;
    const own = this.location(value.loc);
    const range = isJsonRecord(value.range) ? value.range : undefined;
    const begin = range ? this.location(range.begin) : undefined;
    if (range) this.location(range.end);
    const resolved = own ?? begin;
    if (resolved) this.#byNode.set(value, resolved);
    this.visit(value.inner);
  }
}

const TRANSPARENT_KINDS: ReadonlySet<string> = new Set(["ImplicitCastExpr", "ParenExpr", "CStyleCastExpr"]);

function isCPythonName(name: string): boolean {
  return name.startsWith("Py_") || name.startsWith("_Py");
}

function cStringValue(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "string") return parsed;
  } catch (e: unknown) {
    if (!(e instanceof SyntaxError)) throw e;
  }
  return text.replace(/^"|"$/g, "");
}

class SystemsConverter {
  readonly #ids = new NodeIdAllocator();
  readonly #locations: LocationTable;

  constructor(
    root: unknown,
    private readonly file: string
  ) {
    this.#locations = new LocationTable(root);
  }

  private location(raw: JsonRecord): SourceLocation | undefined {
    const resolved = this.#locations.get(raw);
    if (!resolved) return undefined;
    return sourceLocation(resolved.file.length > 0 ? resolved.file : this.file, resolved.line, resolved.column, "systems");
  }

  private malformed(loc: SourceLocation | undefined): (message: string) => never {
    return (message) => fail("SEM1011", message, loc);
  }

  private record(value: unknown, label: string): { readonly raw: JsonRecord; readonly kind: string } {
    const raw = asRecord(value, label, this.malformed(undefined));
    const kind = asString(raw.kind, `${label}.kind`, this.malformed(this.location(raw)));
    return { raw, kind };
  }

  private inner(raw: JsonRecord, label: string): readonly unknown[] {
    if (raw.inner === undefined) return [];
    return asArray(raw.inner, `${label}.inner`, this.malformed(this.location(raw)));
  }

  translationUnit(value: unknown): SystemsTranslationUnit {
    const { raw, kind } = this.record(value, "root");
    if (kind !== "TranslationUnitDecl") {
      fail("SEM1011", `Expected a TranslationUnitDecl at the root, found '${kind}'.`, this.location(raw));
    }
    const declarations: SystemsNode[] = [];
    for (const child of this.inner(raw, "TranslationUnitDecl")) {
      const decl = this.record(child, "declaration");
      if (decl.kind !== "FunctionDecl" || decl.raw.isImplicit === true) continue;
      if (this.#locations.get(decl.raw)?.included === true) continue;
      declarations.push(this.functionDecl(decl.raw));
    }
    return Object.freeze({
      kind: "translationUnit",
      name: this.file,
      declarations: freezeReadonlyArray(declarations),
      meta: metadata(),
    });
  }

  private functionDecl(raw: JsonRecord): SystemsFunction {
    const loc = this.location(raw);
    const onFail = this.malformed(loc);
    const id = this.#ids.next();
    const name = asString(raw.name, "FunctionDecl.name", onFail);
    const type = asRecord(raw.type, `FunctionDecl '${name}'.type`, onFail);
    const qualType = asString(type.qualType, `FunctionDecl '${name}'.type.qualType`, onFail);
    const paren = qualType.indexOf("(");
    const returnText = paren >= 0 ? qualType.slice(0, paren) : qualType;

    const params: SystemsParam[] = [];
    const body: SystemsNode[] = [];
    for (const child of this.inner(raw, `FunctionDecl '${name}'`)) {
      const node = this.record(child, `FunctionDecl '${name}' child`);
      if (node.kind === "ParmVarDecl") params.push(this.param(node.raw, params.length));
      else if (node.kind === "CompoundStmt") body.push(...this.statement(node.raw, node.kind));
    }

    return Object.freeze({
      kind: "function",
      id,
      name,
      returnType: parseCType(returnText),
      params: freezeReadonlyArray(params),
      body: freezeReadonlyArray(body),
      meta: metadata({ sourceLocation: loc }),
    });
  }

  private param(raw: JsonRecord, index: number): SystemsParam {
    const onFail = this.malformed(this.location(raw));
    const name = typeof raw.name === "string" && raw.name.length > 0 ? raw.name : `arg${index}`;
    const type = asRecord(raw.type, `ParmVarDecl '${name}'.type`, onFail);
    return Object.freeze({ name, type: parseCType(asString(type.qualType, `ParmVarDecl '${name}'.type.qualType`, onFail)) });
  }

  private statement(raw: JsonRecord, kind: string): readonly SystemsNode[] {
    switch (kind) {
      case "CompoundStmt":
        return this.inner(raw, kind).flatMap((child) => {
          const stmt = this.record(child, "statement");
          return this.statement(stmt.raw, stmt.kind);
        });
      case "NullStmt":
        return [];
      case "ReturnStmt": {
        const id = this.#ids.next();
        const [value] = this.inner(raw, kind);
        return [
          Object.freeze({
            kind: "return",
            id,
            ...(value === undefined ? {} : { value: this.expression(value) }),
            meta: metadata({ sourceLocation: this.location(raw) }),
          }),
        ];
      }
      default:
        return [this.expressionOf(raw, kind)];
    }
  }

  private expression(value: unknown): SystemsNode {
    const { raw, kind } = this.record(value, "expression");
    return this.expressionOf(raw, kind);
  }

  private unwrap(raw: JsonRecord, kind: string): { readonly raw: JsonRecord; readonly kind: string } {
    let current = { raw, kind };
    while (TRANSPARENT_KINDS.has(current.kind)) {
      const [inner] = this.inner(current.raw, current.kind);
      if (inner === undefined) fail("SEM1011", `${current.kind} has no operand.`, this.location(current.raw));
      current = this.record(inner, current.kind);
    }
    return current;
  }

  private expressionOf(original: JsonRecord, originalKind: string): SystemsNode {
    const { raw, kind } = this.unwrap(original, originalKind);
    const loc = this.location(raw);
    const onFail = this.malformed(loc);
    switch (kind) {
      case "CallExpr":
        return this.call(raw, loc);
      case "DeclRefExpr": {
        const decl = asRecord(raw.referencedDecl, "DeclRefExpr.referencedDecl", onFail);
        return Object.freeze({
          kind: "variable",
          id: this.#ids.next(),
          name: asString(decl.name, "DeclRefExpr.referencedDecl.name", onFail),
          meta: metadata({ sourceLocation: loc }),
        });
      }
      case "IntegerLiteral":
      case "CharacterLiteral":
      case "FloatingLiteral":
      case "StringLiteral":
        return Object.freeze({
          kind: "literal",
          id: this.#ids.next(),
          value: this.literal(raw, kind, onFail),
          meta: metadata({ sourceLocation: loc }),
        });
      default:
        return fail("SEM1010", `Unsupported systems construct '${kind}'.`, loc);
    }
  }

  private literal(raw: JsonRecord, kind: string, onFail: (message: string) => never): LiteralValue {
    const value = raw.value;
    if (kind === "StringLiteral") {
      return { kind: "str", value: cStringValue(asString(value, "StringLiteral.value", onFail)) };
    }
    const n = typeof value === "number" ? value : Number(value);
    if (typeof value !== "number" && typeof value !== "string") onFail(`${kind}.value must be a number.`);
    if (Number.isNaN(n)) onFail(`${kind}.value '${String(value)}' is not a number.`);
    return kind === "FloatingLiteral" ? { kind: "float", value: n } : { kind: "int", value: n };
  }

  private call(raw: JsonRecord, loc: SourceLocation | undefined): SystemsNode {
    const id = this.#ids.next();
    const [calleeRaw, ...argsRaw] = this.inner(raw, "CallExpr");
    if (calleeRaw === undefined) return fail("SEM1011", "CallExpr has no callee.", loc);
    const calleeNode = this.record(calleeRaw, "CallExpr callee");
    const callee = this.unwrap(calleeNode.raw, calleeNode.kind);
    if (callee.kind !== "DeclRefExpr") {
      return fail("SEM1010", `Calls through '${callee.kind}' are not supported; the callee must be a named function.`, loc);
    }
    const decl = asRecord(callee.raw.referencedDecl, "DeclRefExpr.referencedDecl", this.malformed(loc));
    const name = asString(decl.name, "DeclRefExpr.referencedDecl.name", this.malformed(loc));
    const args = freezeReadonlyArray(argsRaw.map((a) => this.expression(a)));
    const meta = metadata({ sourceLocation: loc });
    if (isCPythonName(name)) return Object.freeze({ kind: "cpythonMacro", id, name, args, meta });
    return Object.freeze({ kind: "call", id, callee: name, args, meta });
  }
}

/**
 * Converts a clang `-ast-dump=json` tree into the systems HIR. Only function
 * declarations written in the main file are kept; declarations pulled in
 * from headers and compiler-implicit ones are skipped.
 */
export function convertSystemsAst(
  json: unknown,
  file: string = DEFAULT_SYSTEMS_FILE
): Result<SystemsTranslationUnit, CompileError> {
  return captureCompileError(() => new SystemsConverter(json, file).translationUnit(json));
}

export function extractSystemsFunction(node: SystemsNode): Result<SystemsFunction, CompileError> {
  if (node.kind === "function") return ok(node);
  if (node.kind === "translationUnit") {
    const fn = node.declarations.find((d): d is SystemsFunction => d.kind === "function");
    if (fn) return ok(fn);
  }
  return err(
    new CompileError("SEM1012", `No function definition found in the systems ${node.kind}.`, node.meta.sourceLocation)
  );
}
