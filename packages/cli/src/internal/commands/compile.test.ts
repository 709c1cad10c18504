import { expect } from "chai";
import { readFileSync } from "node:fs";
import { join } from "node:path";

import { CompileError, formatCompileError } from "@seam/compiler";

import { CommandFailed } from "../errors.js";
import { makeProject, writeJson } from "../testing.js";
import { runCompile } from "./compile.js";

function failure(run: () => unknown): unknown {
  try {
    run();
  } catch (e: unknown) {
    return e;
  }
  return undefined;
}

describe("@seam/cli compile", () => {
  it("compiles the inputs named in seam.json from a nested directory", () => {
    const { nested } = makeProject("compile-config", {
      config: { schema: 1, dynamic: "app.py.json", systems: "list.c.json" },
    });
    const run = runCompile({ dir: nested, argv: [] });
    expect(run.code).to.equal("my_list.len()");
    expect(run.diagnostics).to.deep.equal([]);
    expect(run.outFile).to.equal(undefined);
  });

  it("lets flags override the config and writes --out", () => {
    const { root } = makeProject("compile-flags", {
      config: { schema: 1, dynamic: "missing.py.json", systems: "list.c.json", out: "ignored.rs" },
    });
    const run = runCompile({ dir: root, argv: ["--dynamic", "app.py.json", "--out", "out.rs"] });
    expect(run.outFile).to.equal(join(root, "out.rs"));
    expect(readFileSync(join(root, "out.rs"), "utf-8")).to.equal("my_list.len()\n");
  });

  it("requires both inputs", () => {
    const { root } = makeProject("compile-missing", { config: { schema: 1, systems: "list.c.json" } });
    expect(() => runCompile({ dir: root, argv: [] })).to.throw(
      "compile: no dynamic input; pass --dynamic <file> or set 'dynamic' in seam.json."
    );
    expect(() => runCompile({ dir: root, argv: ["--dynamic"] })).to.throw("compile: --dynamic requires a value");
    expect(() => runCompile({ dir: root, argv: ["--verbose"] })).to.throw("compile: unknown argument '--verbose'.");
  });

  it("reports frontend errors with their location", () => {
    const { root } = makeProject("compile-frontend");
    writeJson(join(root, "loop.py.json"), {
      _type: "Module",
      body: [{ _type: "While", lineno: 4, col_offset: 0, test: { _type: "Name", id: "x" }, body: [] }],
    });
    const err = failure(() => runCompile({ dir: root, argv: ["--dynamic", "loop.py.json", "--systems", "list.c.json"] }));
    expect(err).to.be.instanceOf(CompileError);
    expect(err instanceof CompileError ? formatCompileError(err) : "").to.equal(
      "loop.py:4:1: SEM1000: Unsupported dynamic statement 'While'."
    );
  });

  it("reports an unknown pair with the full explanation", () => {
    const { root } = makeProject("compile-unify", { callee: "frobnicate" });
    const err = failure(() => runCompile({ dir: root, argv: ["--dynamic", "app.py.json", "--systems", "list.c.json"] }));
    expect(err).to.be.instanceOf(CommandFailed);
    const lines = err instanceof Error ? err.message.split("\n") : [];
    expect(lines[0]).to.equal("Cannot match dynamic function 'frobnicate' with systems function 'list_length'");
    expect(lines).to.include("  docs/patterns.md#custom-patterns");
  });
});
