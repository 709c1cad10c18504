import { expect } from "chai";

import { formatType } from "@seam/core";

import { parseCType } from "./c-types.js";
import { convertSystemsAst, extractSystemsFunction } from "./systems.js";

// #include <Python.h>
// Py_ssize_t list_length(PyListObject *list) {
//     return Py_SIZE(list);
// }
const listLengthUnit = {
  kind: "TranslationUnitDecl",
  loc: {},
  range: { begin: {}, end: {} },
  inner: [
    {
      kind: "TypedefDecl",
      isImplicit: true,
      name: "__int128_t",
      loc: {},
      range: { begin: {}, end: {} },
      type: { qualType: "__int128" },
    },
    {
      kind: "FunctionDecl",
      name: "PyList_Append",
      loc: {
        offset: 1040,
        file: "/usr/include/python3.12/listobject.h",
        line: 30,
        col: 17,
        tokLen: 13,
        includedFrom: { file: "list.c" },
      },
      range: { begin: { offset: 1024, col: 1, tokLen: 6 }, end: { offset: 1080, col: 57, tokLen: 1 } },
      type: { qualType: "int (PyObject *, PyObject *)" },
    },
    {
      kind: "FunctionDecl",
      name: "list_length",
      loc: { offset: 31, file: "list.c", line: 3, col: 12, tokLen: 11 },
      range: { begin: { offset: 20, col: 1, tokLen: 10 }, end: { offset: 88, line: 5, col: 1, tokLen: 1 } },
      type: { qualType: "Py_ssize_t (PyListObject *)" },
      inner: [
        {
          kind: "ParmVarDecl",
          name: "list",
          loc: { offset: 57, line: 3, col: 38, tokLen: 4 },
          type: { qualType: "PyListObject *" },
        },
        {
          kind: "CompoundStmt",
          range: { begin: { offset: 63, col: 44, tokLen: 1 }, end: { offset: 88, line: 5, col: 1, tokLen: 1 } },
          inner: [
            {
              kind: "ReturnStmt",
              range: { begin: { offset: 69, line: 4, col: 5, tokLen: 6 } },
              inner: [
                {
                  kind: "CallExpr",
                  range: { begin: { offset: 76, col: 12, tokLen: 7 } },
                  type: { qualType: "Py_ssize_t" },
                  inner: [
                    {
                      kind: "ImplicitCastExpr",
                      castKind: "FunctionToPointerDecay",
                      inner: [{ kind: "DeclRefExpr", referencedDecl: { kind: "FunctionDecl", name: "Py_SIZE" } }],
                    },
                    {
                      kind: "ImplicitCastExpr",
                      castKind: "LValueToRValue",
                      inner: [{ kind: "DeclRefExpr", referencedDecl: { kind: "ParmVarDecl", name: "list" } }],
                    },
                  ],
                },
              ],
            },
          ],
        },
      ],
    },
  ],
};

function unitWith(body: readonly unknown[]): unknown {
  return {
    kind: "TranslationUnitDecl",
    inner: [
      {
        kind: "FunctionDecl",
        name: "f",
        loc: { file: "f.c", line: 1, col: 6 },
        type: { qualType: "void (void)" },
        inner: [{ kind: "CompoundStmt", inner: body }],
      },
    ],
  };
}

function errorText(json: unknown): string {
  const result = convertSystemsAst(json);
  return result.ok ? "" : `${result.error.code}: ${result.error.message}`;
}

describe("@seam/compiler systems frontend", () => {
  it("keeps only functions written in the main file", () => {
    const result = convertSystemsAst(listLengthUnit, "list.c");
    if (!result.ok) throw result.error;
    expect(result.value.declarations.map((d) => (d.kind === "function" ? d.name : d.kind))).to.deep.equal([
      "list_length",
    ]);
  });

  it("converts signatures, returns and CPython macro calls", () => {
    const result = convertSystemsAst(listLengthUnit, "list.c");
    if (!result.ok) throw result.error;
    const [fn] = result.value.declarations;
    if (fn?.kind !== "function") throw new Error("expected a function");
    expect(fn.id).to.equal(1);
    expect(formatType(fn.returnType)).to.equal("Py_ssize_t");
    expect(fn.params.map((p) => `${p.name}: ${formatType(p.type)}`)).to.deep.equal(["list: PyListObject*"]);
    expect(fn.meta.sourceLocation).to.deep.equal({ file: "list.c", line: 3, column: 12, language: "systems" });

    const [ret] = fn.body;
    if (ret?.kind !== "return" || ret.value?.kind !== "cpythonMacro") throw new Error("expected a returned macro");
    expect(ret.meta.sourceLocation?.line).to.equal(4);
    expect(ret.value.name).to.equal("Py_SIZE");
    expect(ret.value.meta.sourceLocation).to.deep.equal({ file: "list.c", line: 4, column: 12, language: "systems" });
    expect(ret.value.args).to.have.length(1);
    expect(ret.value.args[0]).to.include({ kind: "variable", name: "list", id: 4 });
  });

  it("converts plain calls and literals", () => {
    const result = convertSystemsAst(
      unitWith([
        {
          kind: "CallExpr",
          inner: [
            { kind: "ImplicitCastExpr", inner: [{ kind: "DeclRefExpr", referencedDecl: { name: "list_append" } }] },
            { kind: "ParenExpr", inner: [{ kind: "IntegerLiteral", value: "7" }] },
            { kind: "ImplicitCastExpr", inner: [{ kind: "StringLiteral", value: "\"a\\tb\"" }] },
          ],
        },
      ])
    );
    if (!result.ok) throw result.error;
    const fn = extractSystemsFunction(result.value);
    if (!fn.ok) throw fn.error;
    const [call] = fn.value.body;
    if (call?.kind !== "call") throw new Error("expected a call");
    expect(call.callee).to.equal("list_append");
    expect(call.args.map((a) => (a.kind === "literal" ? a.value : a.kind))).to.deep.equal([
      { kind: "int", value: 7 },
      { kind: "str", value: "a\tb" },
    ]);
  });

  it("rejects unsupported statements", () => {
    expect(errorText(unitWith([{ kind: "IfStmt", inner: [] }]))).to.equal(
      "SEM1010: Unsupported systems construct 'IfStmt'."
    );
    expect(
      errorText(
        unitWith([{ kind: "CallExpr", inner: [{ kind: "MemberExpr", name: "fn" }] }])
      )
    ).to.equal("SEM1010: Calls through 'MemberExpr' are not supported; the callee must be a named function.");
  });

  it("rejects malformed nodes", () => {
    expect(errorText({ kind: "FunctionDecl" })).to.equal(
      "SEM1011: Expected a TranslationUnitDecl at the root, found 'FunctionDecl'."
    );
    expect(errorText({ kind: "TranslationUnitDecl", inner: [{ kind: "FunctionDecl", name: "f" }] })).to.equal(
      "SEM1011: FunctionDecl 'f'.type must be a JSON object."
    );
    expect(errorText(unitWith([{ kind: "CallExpr" }]))).to.equal("SEM1011: CallExpr has no callee.");
  });

  it("reports units with no function", () => {
    const result = convertSystemsAst({ kind: "TranslationUnitDecl", inner: [] });
    if (!result.ok) throw result.error;
    const fn = extractSystemsFunction(result.value);
    expect(fn.ok ? "" : `${fn.error.code}: ${fn.error.message}`).to.equal(
      "SEM1012: No function definition found in the systems translationUnit."
    );
  });
});

describe("@seam/compiler C type spellings", () => {
  const cases: readonly (readonly [string, string])[] = [
    ["PyListObject *", "PyListObject*"],
    ["PyObject **", "PyObject**"],
    ["const char *", "char*"],
    ["unsigned long", "long"],
    ["long long", "long"],
    ["size_t", "size_t"],
    ["Py_ssize_t", "Py_ssize_t"],
    ["struct node *", "struct node*"],
    ["int[4]", "int[4]"],
    ["my_handle_t", "my_handle_t"],
    ["void", "void"],
  ];

  for (const [spelling, formatted] of cases) {
    it(`reads '${spelling}'`, () => {
      expect(formatType(parseCType(spelling))).to.equal(formatted);
    });
  }
});
