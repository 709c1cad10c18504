import { freezeReadonlyArray } from "./freeze.js";

// Dynamic-side (Python-style) types.
export type DynamicType =
  | { readonly kind: "int" }
  | { readonly kind: "float" }
  | { readonly kind: "str" }
  | { readonly kind: "bool" }
  | { readonly kind: "none" }
  | { readonly kind: "any" }
  | { readonly kind: "list"; readonly element: Type }
  | { readonly kind: "dict"; readonly key: Type; readonly value: Type }
  | { readonly kind: "tuple"; readonly elements: readonly Type[] }
  | { readonly kind: "set"; readonly element: Type }
  | { readonly kind: "class"; readonly name: string };

export type CPythonHandle =
  | "PyObject"
  | "PyListObject"
  | "PyDictObject"
  | "PyTupleObject"
  | "PyTypeObject"
  | "Py_ssize_t";

export const CPYTHON_HANDLES: readonly CPythonHandle[] = freezeReadonlyArray([
  "PyObject",
  "PyListObject",
  "PyDictObject",
  "PyTupleObject",
  "PyTypeObject",
  "Py_ssize_t",
]);

// Systems-side (C-style) types.
export type SystemsType =
  | { readonly kind: "void" }
  | { readonly kind: "char" }
  | { readonly kind: "int" }
  | { readonly kind: "long" }
  | { readonly kind: "size_t" }
  | { readonly kind: "float" }
  | { readonly kind: "double" }
  | { readonly kind: "pointer"; readonly pointee: Type }
  | { readonly kind: "array"; readonly element: Type; readonly size?: number }
  | { readonly kind: "struct"; readonly name: string }
  | { readonly kind: "union"; readonly name: string }
  | { readonly kind: "typedef"; readonly name: string }
  | { readonly kind: "cpython"; readonly handle: CPythonHandle };

export type IntBits = 8 | 16 | 32 | 64 | 128 | "size";

// Target-side (Rust) types.
export type TargetType =
  | { readonly kind: "int"; readonly bits: IntBits; readonly signed: boolean }
  | { readonly kind: "float"; readonly bits: 32 | 64 }
  | { readonly kind: "bool" }
  | { readonly kind: "string" }
  | { readonly kind: "str" }
  | { readonly kind: "vec"; readonly element: Type }
  | { readonly kind: "hashMap"; readonly key: Type; readonly value: Type }
  | { readonly kind: "tuple"; readonly elements: readonly Type[] }
  | { readonly kind: "option"; readonly inner: Type }
  | { readonly kind: "result"; readonly ok: Type; readonly err: Type }
  | { readonly kind: "reference"; readonly mutable: boolean; readonly inner: Type }
  | { readonly kind: "shared"; readonly atomic: boolean; readonly inner: Type }
  | { readonly kind: "custom"; readonly name: string }
  | { readonly kind: "unit" };

export type Type =
  | { readonly domain: "dynamic"; readonly type: DynamicType }
  | { readonly domain: "systems"; readonly type: SystemsType }
  | { readonly domain: "target"; readonly type: TargetType }
  | { readonly domain: "generic"; readonly name: string; readonly bounds: readonly string[] }
  | { readonly domain: "function"; readonly params: readonly Type[]; readonly ret: Type }
  | { readonly domain: "unknown" };

export const UNKNOWN_TYPE: Type = Object.freeze({ domain: "unknown" });

export function dynamicType(type: DynamicType): Type {
  return Object.freeze({ domain: "dynamic", type: Object.freeze(type) });
}

export function systemsType(type: SystemsType): Type {
  return Object.freeze({ domain: "systems", type: Object.freeze(type) });
}

export function targetType(type: TargetType): Type {
  return Object.freeze({ domain: "target", type: Object.freeze(type) });
}

export function genericType(name: string, bounds: readonly string[] = []): Type {
  return Object.freeze({ domain: "generic", name, bounds: freezeReadonlyArray(bounds) });
}

export function functionType(params: readonly Type[], ret: Type): Type {
  return Object.freeze({ domain: "function", params: freezeReadonlyArray(params), ret });
}

export function cpythonType(handle: CPythonHandle): Type {
  return systemsType({ kind: "cpython", handle });
}

/**
 * Structural equality. Field order in the literal does not matter.
 */
export function typeEquals(a: Type, b: Type): boolean {
  return valueEquals(a, b);
}

function valueEquals(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => valueEquals(item, b[i]));
  }
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) return false;
  const ka = Object.keys(a).filter((k) => Reflect.get(a, k) !== undefined);
  const kb = Object.keys(b).filter((k) => Reflect.get(b, k) !== undefined);
  if (ka.length !== kb.length) return false;
  return ka.every((k) => kb.includes(k) && valueEquals(Reflect.get(a, k), Reflect.get(b, k)));
}

function targetKindOf(t: Type): TargetType["kind"] | undefined {
  return t.domain === "target" ? t.type.kind : undefined;
}

function isDynamicKind(t: Type, kind: DynamicType["kind"]): boolean {
  return t.domain === "dynamic" && t.type.kind === kind;
}

function isCPythonHandle(t: Type, handle: CPythonHandle): boolean {
  return t.domain === "systems" && t.type.kind === "cpython" && t.type.handle === handle;
}

// Cross-domain equivalences: (left predicate, target kind).
const CROSS_DOMAIN_RULES: readonly {
  readonly source: (t: Type) => boolean;
  readonly target: TargetType["kind"];
}[] = freezeReadonlyArray([
  { source: (t: Type) => isDynamicKind(t, "list"), target: "vec" },
  { source: (t: Type) => isDynamicKind(t, "dict"), target: "hashMap" },
  { source: (t: Type) => isCPythonHandle(t, "PyListObject"), target: "vec" },
  { source: (t: Type) => isCPythonHandle(t, "PyDictObject"), target: "hashMap" },
]);

/**
 * Whether two types may stand in for one another during argument conversion.
 * Pure and deterministic.
 */
export function isCompatible(a: Type, b: Type): boolean {
  if (a.domain === "unknown" || b.domain === "unknown") return true;
  if (typeEquals(a, b)) return true;
  for (const rule of CROSS_DOMAIN_RULES) {
    if (rule.source(a) && targetKindOf(b) === rule.target) return true;
    if (rule.source(b) && targetKindOf(a) === rule.target) return true;
  }
  return false;
}

function formatDynamic(t: DynamicType): string {
  switch (t.kind) {
    case "int":
    case "float":
    case "str":
    case "bool":
      return t.kind;
    case "none":
      return "None";
    case "any":
      return "Any";
    case "list":
      return `list[${formatType(t.element)}]`;
    case "dict":
      return `dict[${formatType(t.key)}, ${formatType(t.value)}]`;
    case "tuple":
      return `tuple[${t.elements.map(formatType).join(", ")}]`;
    case "set":
      return `set[${formatType(t.element)}]`;
    case "class":
      return t.name;
  }
}

function formatSystems(t: SystemsType): string {
  switch (t.kind) {
    case "void":
    case "char":
    case "int":
    case "long":
    case "size_t":
    case "float":
    case "double":
      return t.kind;
    case "pointer":
      return `${formatType(t.pointee)}*`;
    case "array":
      return `${formatType(t.element)}[${t.size === undefined ? "" : String(t.size)}]`;
    case "struct":
      return `struct ${t.name}`;
    case "union":
      return `union ${t.name}`;
    case "typedef":
      return t.name;
    case "cpython":
      return t.handle === "Py_ssize_t" ? t.handle : `${t.handle}*`;
  }
}

function formatTarget(t: TargetType): string {
  switch (t.kind) {
    case "int":
      return `${t.signed ? "i" : "u"}${t.bits}`;
    case "float":
      return `f${t.bits}`;
    case "bool":
      return "bool";
    case "string":
      return "String";
    case "str":
      return "str";
    case "vec":
      return `Vec<${formatType(t.element)}>`;
    case "hashMap":
      return `HashMap<${formatType(t.key)}, ${formatType(t.value)}>`;
    case "tuple":
      return `(${t.elements.map(formatType).join(", ")})`;
    case "option":
      return `Option<${formatType(t.inner)}>`;
    case "result":
      return `Result<${formatType(t.ok)}, ${formatType(t.err)}>`;
    case "reference":
      return `&${t.mutable ? "mut " : ""}${formatType(t.inner)}`;
    case "shared":
      return `${t.atomic ? "Arc" : "Rc"}<${formatType(t.inner)}>`;
    case "custom":
      return t.name;
    case "unit":
      return "()";
  }
}

export function formatType(t: Type): string {
  switch (t.domain) {
    case "dynamic":
      return formatDynamic(t.type);
    case "systems":
      return formatSystems(t.type);
    case "target":
      return formatTarget(t.type);
    case "generic":
      return t.bounds.length === 0 ? t.name : `${t.name}: ${t.bounds.join(" + ")}`;
    case "function":
      return `fn(${t.params.map(formatType).join(", ")}) -> ${formatType(t.ret)}`;
    case "unknown":
      return "?";
  }
}
