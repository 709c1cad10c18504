import type { Result } from "./result.js";
import { err, ok } from "./result.js";

export type LiteralValue =
  | { readonly kind: "int"; readonly value: number }
  | { readonly kind: "float"; readonly value: number }
  | { readonly kind: "str"; readonly value: string }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "none" };

/**
 * Reads a constant from an AST dump. `typeName` is the constant's type as the
 * dump recorded it; without one, a JSON number with no fraction is an int.
 */
export function literalFromJson(value: unknown, typeName?: string): Result<LiteralValue, string> {
  switch (typeName) {
    case undefined:
    case "int":
    case "bool":
    case "str":
    case "NoneType":
      break;
    case "float":
      if (typeof value === "number") return ok({ kind: "float", value });
      break;
    default:
      return err(`Unsupported constant of type '${typeName}'.`);
  }
  if (value === null) return ok({ kind: "none" });
  if (typeof value === "boolean") return ok({ kind: "bool", value });
  if (typeof value === "string") return ok({ kind: "str", value });
  if (typeof value === "number") {
    if (!Number.isInteger(value)) return ok({ kind: "float", value });
    if (!Number.isSafeInteger(value)) return err(`Integer constant ${String(value)} cannot be represented exactly.`);
    return ok({ kind: "int", value });
  }
  return err("Unsupported constant value.");
}

export function formatLiteral(lit: LiteralValue): string {
  switch (lit.kind) {
    case "int":
      return String(lit.value);
    case "float":
      return Number.isInteger(lit.value) ? `${String(lit.value)}.0` : String(lit.value);
    case "str":
      return JSON.stringify(lit.value);
    case "bool":
      return lit.value ? "true" : "false";
    case "none":
      return "None";
  }
}
