import { expect } from "chai";

import type { RustProgram } from "./ir.js";
import { identExpr, pathExpr, pathType, unitType } from "./ir.js";
import { emitExpr, emitType, writeRustProgram } from "./write.js";

describe("@seam/compiler rust writer", () => {
  it("writes functions with explicit indentation", () => {
    const program: RustProgram = {
      kind: "program",
      items: [
        {
          kind: "fn",
          name: "count",
          params: [{ name: "items", type: { kind: "ref", mut: false, inner: pathType(["Vec"], [pathType(["i32"])]) } }],
          ret: pathType(["usize"]),
          body: [
            { kind: "expr", expr: { kind: "method_call", receiver: identExpr("items"), method: "sort", args: [] } },
            { kind: "tail", expr: { kind: "method_call", receiver: identExpr("items"), method: "len", args: [] } },
          ],
        },
      ],
    };

    expect(writeRustProgram(program, { header: ["// generated"] })).to.equal(
      [
        "// generated",
        "",
        "pub fn count(items: &Vec<i32>) -> usize {",
        "  items.sort();",
        "  items.len()",
        "}",
        "",
      ].join("\n")
    );
  });

  it("groups consecutive use items and separates other items with a blank line", () => {
    const program: RustProgram = {
      kind: "program",
      items: [
        { kind: "use", path: { segments: ["std", "collections", "HashMap"] } },
        { kind: "use", path: { segments: ["std", "rc", "Rc"] } },
        { kind: "fn", name: "noop", params: [], ret: unitType(), body: [] },
      ],
    };

    expect(writeRustProgram(program)).to.equal(
      ["use std::collections::HashMap;", "use std::rc::Rc;", "", "pub fn noop() {", "}", ""].join("\n")
    );
  });

  it("renders method calls, borrows and literals", () => {
    expect(
      emitExpr({
        kind: "method_call",
        receiver: identExpr("config_map"),
        method: "get",
        args: [{ kind: "borrow", expr: identExpr("key") }],
      })
    ).to.equal("config_map.get(&key)");
    expect(emitExpr({ kind: "string", value: 'say "hi"' })).to.equal('"say \\"hi\\""');
    expect(emitExpr({ kind: "bool", value: false })).to.equal("false");
    expect(emitExpr(pathExpr(["None"]))).to.equal("None");
    expect(emitType({ kind: "ref", mut: true, inner: { kind: "tuple", elements: [pathType(["u8"]), unitType()] } })).to.equal(
      "&mut (u8, ())"
    );
  });
});
