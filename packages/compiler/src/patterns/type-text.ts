import type { IntBits, Result, TargetType, Type } from "@seam/core";
import { UNKNOWN_TYPE, err, ok, targetType } from "@seam/core";

// Parses the target-type notation used in the pattern table: `usize`, `()`,
// `Option<?>`, `&mut Vec<i32>`, `HashMap<String, i64>`, `Keys`.

type Token = { readonly text: string; readonly pos: number };

function tokenize(text: string): readonly Token[] {
  const out: Token[] = [];
  const re = /\s*([A-Za-z_][A-Za-z0-9_]*(?:::[A-Za-z_][A-Za-z0-9_]*)*|[<>(),&?])/y;
  let pos = 0;
  while (pos < text.length) {
    if (/^\s*$/.test(text.slice(pos))) break;
    re.lastIndex = pos;
    const m = re.exec(text);
    if (!m || m[1] === undefined) {
      out.push({ text: "<invalid>", pos });
      break;
    }
    out.push({ text: m[1], pos: re.lastIndex - m[1].length });
    pos = re.lastIndex;
  }
  return out;
}

type IntShape = { readonly bits: IntBits; readonly signed: boolean };

const INT_NAMES: ReadonlyMap<string, IntShape> = new Map<string, IntShape>([
  ["i8", { bits: 8, signed: true }],
  ["i16", { bits: 16, signed: true }],
  ["i32", { bits: 32, signed: true }],
  ["i64", { bits: 64, signed: true }],
  ["i128", { bits: 128, signed: true }],
  ["isize", { bits: "size", signed: true }],
  ["u8", { bits: 8, signed: false }],
  ["u16", { bits: 16, signed: false }],
  ["u32", { bits: 32, signed: false }],
  ["u64", { bits: 64, signed: false }],
  ["u128", { bits: 128, signed: false }],
  ["usize", { bits: "size", signed: false }],
]);

const GENERIC_ARITY: ReadonlyMap<string, number> = new Map<string, number>([
  ["Vec", 1],
  ["Option", 1],
  ["Rc", 1],
  ["Arc", 1],
  ["HashMap", 2],
  ["Result", 2],
]);

class TypeTextParser {
  #pos = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  parse(): Result<Type, string> {
    const t = this.type();
    if (!t.ok) return t;
    const rest = this.peek();
    if (rest) return err(`unexpected '${rest.text}' at ${rest.pos}`);
    return t;
  }

  private peek(): Token | undefined {
    return this.tokens[this.#pos];
  }

  private take(): Token | undefined {
    const t = this.tokens[this.#pos];
    if (t) this.#pos++;
    return t;
  }

  private expect(text: string): Result<void, string> {
    const t = this.take();
    if (!t) return err(`expected '${text}' at end of input`);
    if (t.text !== text) return err(`expected '${text}' at ${t.pos}, found '${t.text}'`);
    return ok(undefined);
  }

  private list(close: string): Result<readonly Type[], string> {
    const items: Type[] = [];
    if (this.peek()?.text === close) {
      this.take();
      return ok(items);
    }
    while (true) {
      const item = this.type();
      if (!item.ok) return item;
      items.push(item.value);
      const sep = this.take();
      if (!sep) return err(`expected '${close}' at end of input`);
      if (sep.text === close) return ok(items);
      if (sep.text !== ",") return err(`expected ',' or '${close}' at ${sep.pos}, found '${sep.text}'`);
    }
  }

  private type(): Result<Type, string> {
    const t = this.take();
    if (!t) return err("expected a type at end of input");
    if (t.text === "?") return ok(UNKNOWN_TYPE);
    if (t.text === "&") {
      const mutable = this.peek()?.text === "mut";
      if (mutable) this.take();
      const inner = this.type();
      if (!inner.ok) return inner;
      return ok(targetType({ kind: "reference", mutable, inner: inner.value }));
    }
    if (t.text === "(") {
      const elements = this.list(")");
      if (!elements.ok) return elements;
      return ok(
        elements.value.length === 0 ? targetType({ kind: "unit" }) : targetType({ kind: "tuple", elements: elements.value })
      );
    }
    if (!/^[A-Za-z_]/.test(t.text)) return err(`unexpected '${t.text}' at ${t.pos}`);
    return this.named(t);
  }

  private named(t: Token): Result<Type, string> {
    const simple = this.simpleNamed(t.text);
    if (simple) return ok(targetType(simple));

    const arity = GENERIC_ARITY.get(t.text);
    if (arity === undefined) return ok(targetType({ kind: "custom", name: t.text }));

    const open = this.expect("<");
    if (!open.ok) return open;
    const args = this.list(">");
    if (!args.ok) return args;
    if (args.value.length !== arity) {
      return err(`'${t.text}' takes ${arity} type argument(s), got ${args.value.length}`);
    }
    const [a, b] = args.value;
    if (a === undefined) return err(`'${t.text}' is missing its type argument`);
    switch (t.text) {
      case "Vec":
        return ok(targetType({ kind: "vec", element: a }));
      case "Option":
        return ok(targetType({ kind: "option", inner: a }));
      case "Rc":
      case "Arc":
        return ok(targetType({ kind: "shared", atomic: t.text === "Arc", inner: a }));
      case "HashMap":
        return ok(targetType({ kind: "hashMap", key: a, value: b ?? UNKNOWN_TYPE }));
      default:
        return ok(targetType({ kind: "result", ok: a, err: b ?? UNKNOWN_TYPE }));
    }
  }

  private simpleNamed(name: string): TargetType | undefined {
    const int = INT_NAMES.get(name);
    if (int) return { kind: "int", bits: int.bits, signed: int.signed };
    switch (name) {
      case "f32":
        return { kind: "float", bits: 32 };
      case "f64":
        return { kind: "float", bits: 64 };
      case "bool":
        return { kind: "bool" };
      case "String":
        return { kind: "string" };
      case "str":
        return { kind: "str" };
      default:
        return undefined;
    }
  }
}

export function parseTargetTypeText(text: string): Result<Type, string> {
  return new TypeTextParser(tokenize(text)).parse();
}
