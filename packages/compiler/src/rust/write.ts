import type { RustExpr, RustItem, RustParam, RustProgram, RustStmt, RustType } from "./ir.js";

const INDENT_UNIT = "  ";

function emitPath(segments: readonly string[]): string {
  return segments.join("::");
}

export function emitType(ty: RustType): string {
  switch (ty.kind) {
    case "unit":
      return "()";
    case "infer":
      return "_";
    case "ref":
      return `&${ty.mut ? "mut " : ""}${emitType(ty.inner)}`;
    case "tuple":
      return `(${ty.elements.map(emitType).join(", ")})`;
    case "path": {
      const base = emitPath(ty.path.segments);
      if (ty.args.length === 0) return base;
      return `${base}<${ty.args.map(emitType).join(", ")}>`;
    }
  }
}

export function emitExpr(expr: RustExpr): string {
  switch (expr.kind) {
    case "ident":
      return expr.name;
    case "path":
      return emitPath(expr.path.segments);
    case "number":
      return expr.text;
    case "string":
      return JSON.stringify(expr.value);
    case "bool":
      return expr.value ? "true" : "false";
    case "borrow":
      return `&${emitExpr(expr.expr)}`;
    case "method_call":
      return `${emitExpr(expr.receiver)}.${expr.method}(${expr.args.map(emitExpr).join(", ")})`;
  }
}

function emitStmtLines(st: RustStmt, indent: string): string[] {
  switch (st.kind) {
    case "expr":
      return [`${indent}${emitExpr(st.expr)};`];
    case "tail":
      return [`${indent}${emitExpr(st.expr)}`];
  }
}

function emitParam(p: RustParam): string {
  return `${p.name}: ${emitType(p.type)}`;
}

function emitItem(item: RustItem, indent: string): string[] {
  switch (item.kind) {
    case "use":
      return [`${indent}use ${emitPath(item.path.segments)};`];
    case "fn": {
      const out: string[] = [];
      const retClause = item.ret.kind === "unit" ? "" : ` -> ${emitType(item.ret)}`;
      out.push(`${indent}pub fn ${item.name}(${item.params.map(emitParam).join(", ")})${retClause} {`);
      const bodyIndent = `${indent}${INDENT_UNIT}`;
      for (const st of item.body) out.push(...emitStmtLines(st, bodyIndent));
      out.push(`${indent}}`);
      return out;
    }
  }
}

export function writeRustProgram(program: RustProgram, opts?: { readonly header?: readonly string[] }): string {
  const parts: string[] = [];
  for (const h of opts?.header ?? []) parts.push(h);
  let previous: RustItem["kind"] | undefined;
  for (const item of program.items) {
    // Consecutive `use` lines stay grouped.
    if (parts.length > 0 && !(previous === "use" && item.kind === "use")) parts.push("");
    parts.push(...emitItem(item, ""));
    previous = item.kind;
  }
  parts.push("");
  return parts.join("\n");
}
