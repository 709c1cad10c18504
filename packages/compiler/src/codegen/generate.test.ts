import { expect } from "chai";

import type { UnifiedCall, UnifiedFunction, UnifiedNode } from "@seam/core";
import { UNKNOWN_TYPE, metadata, targetType } from "@seam/core";

import { OptimizationPipeline } from "../passes/pipeline.js";
import { parsePatternRegistry } from "../patterns/registry.js";
import { extractReceiverName, generate } from "./generate.js";

function variable(id: number, name: string): UnifiedNode {
  return { kind: "variable", id, name, varType: UNKNOWN_TYPE, sourceLanguage: "dynamic", meta: metadata() };
}

function call(pattern: string, callee: string, args: readonly UnifiedNode[], eliminated = true): UnifiedCall {
  return {
    kind: "call",
    id: 1,
    targetLanguage: "target",
    callee,
    args,
    inferredType: UNKNOWN_TYPE,
    sourceLanguage: "dynamic",
    crossMapping: { pattern, boundaryEliminated: eliminated },
    meta: metadata(),
  };
}

function text(node: UnifiedNode, fallbackReceiver?: string): string {
  const result = generate(node, fallbackReceiver === undefined ? {} : { fallbackReceiver });
  if (!result.ok) throw result.error;
  return result.value;
}

function failure(node: UnifiedNode): string {
  const result = generate(node);
  return result.ok ? "" : `${result.error.code}: ${result.error.message}`;
}

const usize = targetType({ kind: "int", bits: "size", signed: false });
const i32 = targetType({ kind: "int", bits: 32, signed: true });

describe("@seam/compiler code generation", () => {
  it("keeps the receiver's name", () => {
    expect(text(call("len", "Vec::len", [variable(2, "my_list")]))).to.equal("my_list.len()");
    expect(text(call("pop", "Vec::pop", [variable(2, "log_entries")]))).to.equal("log_entries.pop()");
  });

  it("falls back to a placeholder receiver", () => {
    const literalFirst = call("len", "Vec::len", [
      { kind: "literal", id: 2, value: { kind: "int", value: 42 }, litType: UNKNOWN_TYPE, meta: metadata() },
    ]);
    expect(text(literalFirst)).to.equal("x.len()");
    expect(text(call("len", "Vec::len", []), "data")).to.equal("data.len()");
    expect(extractReceiverName([], "items")).to.equal("items");
  });

  it("fills template slots from the remaining arguments", () => {
    expect(text(call("append", "Vec::push", [variable(2, "my_vector")]))).to.equal("my_vector.push(item)");
    expect(text(call("append", "Vec::push", [variable(2, "my_vector"), variable(3, "value")]))).to.equal(
      "my_vector.push(value)"
    );
    expect(text(call("dict_get", "HashMap::get", [variable(2, "config_map"), variable(3, "key")]))).to.equal(
      "config_map.get(&key)"
    );
    expect(
      text(
        call("insert", "Vec::insert", [
          variable(2, "queue"),
          { kind: "literal", id: 3, value: { kind: "int", value: 0 }, litType: UNKNOWN_TYPE, meta: metadata() },
        ])
      )
    ).to.equal("queue.insert(0, item)");
    const whole = { kind: "float", value: 2 } as const;
    expect(
      text(
        call("append", "Vec::push", [
          variable(2, "samples"),
          { kind: "literal", id: 3, value: whole, litType: UNKNOWN_TYPE, meta: metadata() },
        ])
      )
    ).to.equal("samples.push(2.0)");
  });

  it("keeps omitted arguments in their source positions", () => {
    const receiverOmitted = { ...call("append", "Vec::push", [variable(3, "value")]), omittedArgs: [0] };
    expect(text(receiverOmitted)).to.equal("x.push(value)");
    const itemOmitted = {
      ...call("insert", "Vec::insert", [variable(2, "queue"), variable(4, "job")]),
      omittedArgs: [1],
    };
    expect(text(itemOmitted)).to.equal("queue.insert(index, job)");
  });

  it("renders nested eliminated calls in slots", () => {
    const nested = { ...call("pop", "Vec::pop", [variable(4, "stack")]), id: 3 };
    expect(text(call("append", "Vec::push", [variable(2, "out"), nested]))).to.equal("out.push(stack.pop())");
  });

  it("refuses calls whose boundary is still pending", () => {
    expect(failure(call("len", "Vec::len", [variable(2, "my_list")], false))).to.equal(
      "SEM1300: Call to 'Vec::len' still crosses the dynamic/systems boundary; run the optimizer first."
    );
  });

  it("refuses patterns with no registered template", () => {
    const registry = parsePatternRegistry({ schema: 1, documentation: "d", patterns: [] });
    const result = generate(call("len", "Vec::len", [variable(2, "my_list")]), { registry });
    expect(result.ok ? "" : `${result.error.code}: ${result.error.message}`).to.equal(
      "SEM1301: No template registered for pattern 'len'."
    );
  });

  it("refuses standalone values", () => {
    expect(failure(variable(1, "orphan"))).to.equal("SEM1302: A standalone variable cannot be generated.");
  });

  it("renders functions with a tail expression", () => {
    const fn: UnifiedFunction = {
      kind: "function",
      id: 1,
      name: "count",
      params: [
        {
          name: "items",
          paramType: targetType({ kind: "reference", mutable: false, inner: targetType({ kind: "vec", element: i32 }) }),
          sourceLanguage: "target",
        },
      ],
      returnType: usize,
      body: [{ ...call("len", "Vec::len", [variable(3, "items")]), id: 2 }],
      sourceLanguage: "dynamic",
      meta: metadata(),
    };
    expect(text(fn)).to.equal("pub fn count(items: &Vec<i32>) -> usize {\n  items.len()\n}\n");
  });

  it("imports the collections a module's signatures use", () => {
    const lookup: UnifiedFunction = {
      kind: "function",
      id: 1,
      name: "lookup",
      params: [
        {
          name: "config_map",
          paramType: targetType({ kind: "hashMap", key: targetType({ kind: "string" }), value: i32 }),
          sourceLanguage: "target",
        },
        { name: "key", paramType: targetType({ kind: "string" }), sourceLanguage: "target" },
      ],
      returnType: targetType({ kind: "unit" }),
      body: [{ ...call("dict_get", "HashMap::get", [variable(3, "config_map"), variable(4, "key")]), id: 2 }],
      sourceLanguage: "dynamic",
      meta: metadata(),
    };
    const module: UnifiedNode = {
      kind: "module",
      name: "lookups",
      sourceLanguage: "dynamic",
      declarations: [lookup],
      meta: metadata(),
    };
    expect(text(module)).to.equal(
      [
        "use std::collections::HashMap;",
        "",
        "pub fn lookup(config_map: HashMap<String, i32>, key: String) {",
        "  config_map.get(&key);",
        "}",
        "",
      ].join("\n")
    );
  });

  it("generates the optimizer's output", () => {
    const optimized = OptimizationPipeline.standard().run(call("len", "Vec::len", [variable(2, "my_list")], false));
    if (!optimized.ok) throw optimized.error;
    const code = text(optimized.value);
    expect(code).to.equal("my_list.len()");
    expect(code).to.not.include("unsafe");
  });
});
