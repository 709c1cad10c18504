import { expect } from "chai";
import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { DumpSpawn } from "./ast-dump.js";
import { clangDumpCommand, inputKind, loadAst, pythonDumpCommand } from "./ast-dump.js";
import { writeJson } from "./testing.js";

describe("@seam/cli ast dumps", () => {
  it("classifies inputs by extension", () => {
    expect(inputKind("a/app.py.json")).to.equal("json");
    expect(inputKind("app.PY")).to.equal("python");
    expect(inputKind("list.c")).to.equal("c");
    expect(() => inputKind("list.rs")).to.throw("list.rs: expected a .json AST dump, a .py file or a .c file.");
  });

  it("builds the dump commands", () => {
    expect(clangDumpCommand("list.c", ["-I/opt/py/include"])).to.deep.equal({
      command: "clang",
      args: ["-Xclang", "-ast-dump=json", "-fsyntax-only", "-I/opt/py/include", "list.c"],
    });
    const py = pythonDumpCommand("app.py");
    expect(py.command).to.equal("python3");
    expect(py.args[0]).to.equal("-c");
    expect(py.args[1]).to.include("ast.parse(f.read(), sys.argv[1])");
    expect(py.args[1]).to.include("out['_value_type'] = type(n.value).__name__");
    expect(py.args[2]).to.equal("app.py");
  });

  it("reads JSON dumps directly", () => {
    const root = mkdtempSync(join(tmpdir(), "seam-dump-json-"));
    writeJson(join(root, "app.json"), { _type: "Module", body: [] });
    expect(loadAst(join(root, "app.json"))).to.deep.equal({ _type: "Module", body: [] });
  });

  it("runs the dumper for source files", () => {
    const calls: string[] = [];
    const spawn: DumpSpawn = (command, args) => {
      calls.push(`${command} ${args[args.length - 1] ?? ""}`);
      return { status: 0, stdout: '{"kind":"TranslationUnitDecl"}', stderr: "" };
    };
    expect(loadAst("list.c", { spawn })).to.deep.equal({ kind: "TranslationUnitDecl" });
    expect(calls).to.deep.equal(["clang list.c"]);
  });

  it("reports dumper failures", () => {
    const failing: DumpSpawn = () => ({ status: 1, stdout: "", stderr: "SyntaxError: invalid syntax\n" });
    expect(() => loadAst("app.py", { spawn: failing })).to.throw(
      "app.py: python3 exited with status 1.\nSyntaxError: invalid syntax"
    );
    const missing: DumpSpawn = () => ({ status: null, stdout: "", stderr: "", error: new Error("spawn clang ENOENT") });
    expect(() => loadAst("list.c", { spawn: missing })).to.throw("list.c: could not run clang: spawn clang ENOENT");
    const garbled: DumpSpawn = () => ({ status: 0, stdout: "not json", stderr: "" });
    expect(() => loadAst("list.c", { spawn: garbled })).to.throw("list.c (clang output): invalid JSON");
  });
});
