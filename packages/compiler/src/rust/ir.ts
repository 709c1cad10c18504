// Minimal Rust IR for rendering unified calls and their enclosing functions.
// Functions are always written `pub`.

export type RustPath = {
  readonly segments: readonly string[];
};

export type RustType =
  | { readonly kind: "unit" }
  | { readonly kind: "infer" }
  | { readonly kind: "ref"; readonly mut: boolean; readonly inner: RustType }
  | { readonly kind: "tuple"; readonly elements: readonly RustType[] }
  | { readonly kind: "path"; readonly path: RustPath; readonly args: readonly RustType[] };

export type RustExpr =
  | { readonly kind: "ident"; readonly name: string }
  | { readonly kind: "path"; readonly path: RustPath }
  | { readonly kind: "number"; readonly text: string }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "borrow"; readonly expr: RustExpr }
  | {
      readonly kind: "method_call";
      readonly receiver: RustExpr;
      readonly method: string;
      readonly args: readonly RustExpr[];
    };

export type RustStmt =
  | { readonly kind: "expr"; readonly expr: RustExpr }
  // Final expression of a block, written without a trailing semicolon.
  | { readonly kind: "tail"; readonly expr: RustExpr };

export type RustParam = { readonly name: string; readonly type: RustType };

export type RustItem =
  | {
      readonly kind: "use";
      readonly path: RustPath;
    }
  | {
      readonly kind: "fn";
      readonly name: string;
      readonly params: readonly RustParam[];
      readonly ret: RustType;
      readonly body: readonly RustStmt[];
    };

export type RustProgram = {
  readonly kind: "program";
  readonly items: readonly RustItem[];
};

export function unitType(): RustType {
  return { kind: "unit" };
}

export function pathType(segments: readonly string[], args: readonly RustType[] = []): RustType {
  return { kind: "path", path: { segments }, args };
}

export function identExpr(name: string): RustExpr {
  return { kind: "ident", name };
}

export function pathExpr(segments: readonly string[]): RustExpr {
  return { kind: "path", path: { segments } };
}
