import { expect } from "chai";

import { EMPTY_METADATA } from "./metadata.js";
import { UNKNOWN_TYPE } from "./types.js";
import type { CrossMapping, UnifiedNode } from "./unified.js";
import { eliminateBoundary, positionalArgs, unifiedNodeId, walkUnified } from "./unified.js";

describe("@seam/core unified graph", () => {
  const call: UnifiedNode = {
    kind: "call",
    id: 1,
    targetLanguage: "target",
    callee: "Vec::len",
    args: [{ kind: "variable", id: 2, name: "xs", varType: UNKNOWN_TYPE, sourceLanguage: "dynamic", meta: EMPTY_METADATA }],
    inferredType: UNKNOWN_TYPE,
    sourceLanguage: "dynamic",
    meta: EMPTY_METADATA,
  };

  it("walks nodes in pre-order with depth", () => {
    const module: UnifiedNode = {
      kind: "module",
      name: "main",
      sourceLanguage: "dynamic",
      declarations: [call],
      meta: EMPTY_METADATA,
    };
    const seen: string[] = [];
    walkUnified(module, (node, depth) => seen.push(`${depth}:${node.kind}`));
    expect(seen).to.deep.equal(["0:module", "1:call", "2:variable"]);
    expect(unifiedNodeId(module)).to.equal(undefined);
    expect(unifiedNodeId(call)).to.equal(1);
  });

  it("only moves the boundary flag forward", () => {
    const pending: CrossMapping = { pattern: "len", boundaryEliminated: false, dynamicNode: 4 };
    const done = eliminateBoundary(pending);
    expect(done).to.deep.equal({ pattern: "len", boundaryEliminated: true, dynamicNode: 4 });
    expect(pending.boundaryEliminated).to.equal(false);
    expect(eliminateBoundary(done)).to.equal(done);
  });

  it("restores omitted arguments as holes at their source positions", () => {
    if (call.kind !== "call") throw new Error("expected a call");
    const [xs] = call.args;
    expect(positionalArgs(call)).to.deep.equal([xs]);
    expect(positionalArgs({ ...call, omittedArgs: [0, 2] })).to.deep.equal([undefined, xs, undefined]);
  });
});
