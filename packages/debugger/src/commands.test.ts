import { expect } from "chai";

import { parseCommand } from "./commands.js";

describe("@seam/debugger commands", () => {
  it("treats an empty line as step", () => {
    expect(parseCommand("")).to.deep.equal({ ok: true, value: { kind: "step" } });
    expect(parseCommand("   ")).to.deep.equal({ ok: true, value: { kind: "step" } });
  });

  it("accepts short forms and any case", () => {
    expect(parseCommand("S")).to.deep.equal({ ok: true, value: { kind: "step" } });
    expect(parseCommand("c")).to.deep.equal({ ok: true, value: { kind: "continue" } });
    expect(parseCommand("?")).to.deep.equal({ ok: true, value: { kind: "help" } });
    expect(parseCommand("exit")).to.deep.equal({ ok: true, value: { kind: "quit" } });
    expect(parseCommand("i Unified")).to.deep.equal({ ok: true, value: { kind: "inspect", target: "unified" } });
  });

  it("parses breakpoints", () => {
    expect(parseCommand("b boundary")).to.deep.equal({
      ok: true,
      value: { kind: "break", breakpoint: { kind: "boundaryElimination" } },
    });
    expect(parseCommand("break phase unified hir")).to.deep.equal({
      ok: true,
      value: { kind: "break", breakpoint: { kind: "phase", name: "unified hir", phase: "UnifiedHIR" } },
    });
    expect(parseCommand("break fn count")).to.deep.equal({
      ok: true,
      value: { kind: "break", breakpoint: { kind: "function", name: "count" } },
    });
    expect(parseCommand("clear 2")).to.deep.equal({ ok: true, value: { kind: "clear", index: 2 } });
  });

  it("reports malformed commands", () => {
    const errors = [
      "inspect",
      "break",
      "break phase",
      "break phase linked",
      "break function",
      "break watch x",
      "clear",
      "clear -1",
      "frob",
    ].map((line) => {
      const parsed = parseCommand(line);
      return parsed.ok ? "" : parsed.error;
    });
    expect(errors).to.deep.equal([
      "inspect requires a target",
      "break requires a breakpoint type",
      "break phase requires phase name",
      "Unknown phase: 'linked'",
      "break function requires function name",
      "Unknown breakpoint type: 'watch'",
      "clear requires breakpoint number",
      "Invalid breakpoint number",
      "Unknown command: 'frob'. Type 'help' for commands.",
    ]);
  });
});
