import { expect } from "chai";
import { readFileSync, readdirSync, statSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import ts from "typescript";

import {
  COMPILER_DIAGNOSTIC_CODES,
  assertCompilerDiagnosticCode,
  compilerDiagnosticDomain,
  compilerDiagnosticSeverity,
  diagnostic,
  formatDiagnostic,
} from "./diagnostics.js";
import { CompileError, formatCompileError } from "./errors.js";

describe("@seam/compiler diagnostics registry", () => {
  const srcRoot = dirname(fileURLToPath(import.meta.url));
  const registryFile = join(srcRoot, "diagnostics.ts");

  function compilerSourceFiles(): readonly string[] {
    const out: string[] = [];
    const walk = (dir: string): void => {
      for (const entry of readdirSync(dir)) {
        const abs = join(dir, entry);
        if (statSync(abs).isDirectory()) {
          walk(abs);
          continue;
        }
        if (!abs.endsWith(".ts") || abs.endsWith(".test.ts")) continue;
        out.push(abs);
      }
    };
    walk(srcRoot);
    return out.sort((a, b) => a.localeCompare(b));
  }

  function usedCodes(): readonly string[] {
    const matches = new Set<string>();
    for (const file of compilerSourceFiles()) {
      if (file === registryFile) continue;
      for (const code of readFileSync(file, "utf-8").match(/\bSEM\d{4}\b/g) ?? []) matches.add(code);
    }
    return [...matches].sort((a, b) => a.localeCompare(b));
  }

  it("keeps codes normalized and unique", () => {
    const values = [...COMPILER_DIAGNOSTIC_CODES];
    expect(new Set(values).size).to.equal(values.length);
    for (const code of values) expect(code).to.match(/^SEM\d{4}$/);
  });

  it("keeps code usage synchronized with the registry", () => {
    const fromRegistry = [...COMPILER_DIAGNOSTIC_CODES].sort((a, b) => a.localeCompare(b));
    expect(usedCodes()).to.deep.equal(fromRegistry);
  });

  it("rejects unknown codes", () => {
    expect(() => assertCompilerDiagnosticCode("SEM9999")).to.throw("Unknown compiler diagnostic code: SEM9999");
    expect(() => new CompileError("SEM9999", "nope")).to.throw("Unknown compiler diagnostic code");
  });

  it("maps each code into a known domain", () => {
    for (const code of COMPILER_DIAGNOSTIC_CODES) {
      expect(compilerDiagnosticDomain(code)).to.not.equal("other");
    }
    expect(compilerDiagnosticDomain("SEM1100")).to.equal("unify");
    expect(compilerDiagnosticSeverity("SEM1103")).to.equal("warning");
    expect(compilerDiagnosticSeverity("SEM1300")).to.equal("error");
  });

  it("formats diagnostics and errors with their location", () => {
    const loc = { file: "app.py", line: 3, column: 5, language: "dynamic" } as const;
    expect(formatDiagnostic(diagnostic("SEM1104", "'len' expects 1 argument(s), got 2.", loc))).to.equal(
      "app.py:3:5: warning SEM1104: 'len' expects 1 argument(s), got 2."
    );
    expect(formatCompileError(new CompileError("SEM1302", "A standalone literal cannot be generated."))).to.equal(
      "SEM1302: A standalone literal cannot be generated."
    );
  });

  it("keeps compiler paths free of raw Error throws", () => {
    const offenders = compilerSourceFiles().filter(
      (file) => file !== registryFile && readFileSync(file, "utf-8").includes("throw new Error(")
    );
    expect(offenders).to.deep.equal([]);
  });

  it("keeps direct fail(...) calls span-annotated", () => {
    const offenders: string[] = [];
    for (const file of compilerSourceFiles()) {
      const sf = ts.createSourceFile(file, readFileSync(file, "utf-8"), ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
      const walk = (node: ts.Node): void => {
        if (ts.isCallExpression(node) && ts.isIdentifier(node.expression) && node.expression.text === "fail") {
          if (node.arguments.length < 3) {
            const { line, character } = sf.getLineAndCharacterOfPosition(node.getStart(sf));
            offenders.push(`${file}:${line + 1}:${character + 1}`);
          }
        }
        ts.forEachChild(node, walk);
      };
      walk(sf);
    }
    expect(offenders).to.deep.equal([]);
  });
});
