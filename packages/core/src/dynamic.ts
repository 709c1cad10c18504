import type { NodeId } from "./ids.js";
import type { LiteralValue } from "./literal.js";
import type { Metadata } from "./metadata.js";

// HIR for the dynamic (Python-style) side, built from an external AST dump.

export type DynamicModule = {
  readonly kind: "module";
  readonly name: string;
  readonly body: readonly DynamicNode[];
  readonly meta: Metadata;
};

export type DynamicFunction = {
  readonly kind: "function";
  readonly id: NodeId;
  readonly name: string;
  readonly params: readonly string[];
  readonly body: readonly DynamicNode[];
  readonly meta: Metadata;
};

export type DynamicReturn = {
  readonly kind: "return";
  readonly id: NodeId;
  readonly value?: DynamicNode;
  readonly meta: Metadata;
};

export type DynamicCall = {
  readonly kind: "call";
  readonly id: NodeId;
  readonly callee: DynamicNode;
  readonly args: readonly DynamicNode[];
  readonly meta: Metadata;
};

export type DynamicVariable = {
  readonly kind: "variable";
  readonly id: NodeId;
  readonly name: string;
  readonly meta: Metadata;
};

export type DynamicLiteral = {
  readonly kind: "literal";
  readonly id: NodeId;
  readonly value: LiteralValue;
  readonly meta: Metadata;
};

export type DynamicNode =
  | DynamicModule
  | DynamicFunction
  | DynamicReturn
  | DynamicCall
  | DynamicVariable
  | DynamicLiteral;
