import type { NodeId } from "./ids.js";
import type { LiteralValue } from "./literal.js";
import type { Metadata } from "./metadata.js";
import type { Type } from "./types.js";

// HIR for the systems (C/CPython-style) side.

export type SystemsParam = {
  readonly name: string;
  readonly type: Type;
};

export type SystemsTranslationUnit = {
  readonly kind: "translationUnit";
  readonly name: string;
  readonly declarations: readonly SystemsNode[];
  readonly meta: Metadata;
};

export type SystemsFunction = {
  readonly kind: "function";
  readonly id: NodeId;
  readonly name: string;
  readonly returnType: Type;
  readonly params: readonly SystemsParam[];
  readonly body: readonly SystemsNode[];
  readonly meta: Metadata;
};

export type SystemsReturn = {
  readonly kind: "return";
  readonly id: NodeId;
  readonly value?: SystemsNode;
  readonly meta: Metadata;
};

export type SystemsCall = {
  readonly kind: "call";
  readonly id: NodeId;
  readonly callee: string;
  readonly args: readonly SystemsNode[];
  readonly meta: Metadata;
};

// Calls into the CPython API surface (`Py_*`, `_Py*`).
export type SystemsCPythonMacro = {
  readonly kind: "cpythonMacro";
  readonly id: NodeId;
  readonly name: string;
  readonly args: readonly SystemsNode[];
  readonly meta: Metadata;
};

export type SystemsVariable = {
  readonly kind: "variable";
  readonly id: NodeId;
  readonly name: string;
  readonly meta: Metadata;
};

export type SystemsLiteral = {
  readonly kind: "literal";
  readonly id: NodeId;
  readonly value: LiteralValue;
  readonly meta: Metadata;
};

export type SystemsNode =
  | SystemsTranslationUnit
  | SystemsFunction
  | SystemsReturn
  | SystemsCall
  | SystemsCPythonMacro
  | SystemsVariable
  | SystemsLiteral;
