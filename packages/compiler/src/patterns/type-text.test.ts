import { expect } from "chai";

import { formatType } from "@seam/core";

import { parseTargetTypeText } from "./type-text.js";

function formatted(text: string): string {
  const parsed = parseTargetTypeText(text);
  if (!parsed.ok) throw new Error(parsed.error);
  return formatType(parsed.value);
}

function failure(text: string): string {
  const parsed = parseTargetTypeText(text);
  return parsed.ok ? "" : parsed.error;
}

describe("@seam/compiler target type text", () => {
  it("reads scalar names", () => {
    expect(formatted("usize")).to.equal("usize");
    expect(formatted("i64")).to.equal("i64");
    expect(formatted("f32")).to.equal("f32");
    expect(formatted("String")).to.equal("String");
  });

  it("reads unit, tuples and references", () => {
    expect(formatted("()")).to.equal("()");
    expect(formatted("(u8, bool)")).to.equal("(u8, bool)");
    expect(formatted("&mut Vec<i32>")).to.equal("&mut Vec<i32>");
    expect(formatted("&str")).to.equal("&str");
  });

  it("reads generics with the unknown placeholder", () => {
    expect(formatted("Option<?>")).to.equal("Option<?>");
    expect(formatted("HashMap<String, i64>")).to.equal("HashMap<String, i64>");
    expect(formatted("Arc<Vec<u8>>")).to.equal("Arc<Vec<u8>>");
  });

  it("keeps unrecognised names as custom types", () => {
    const parsed = parseTargetTypeText("Keys");
    expect(parsed.ok && parsed.value).to.deep.equal({ domain: "target", type: { kind: "custom", name: "Keys" } });
  });

  it("reports argument count and trailing input", () => {
    expect(failure("Vec<i32, i32>")).to.equal("'Vec' takes 1 type argument(s), got 2");
    expect(failure("Vec<i32> x")).to.equal("unexpected 'x' at 9");
    expect(failure("Vec")).to.equal("expected '<' at end of input");
    expect(failure("")).to.equal("expected a type at end of input");
  });
});
