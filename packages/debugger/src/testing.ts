// AST dumps for `def count(my_list): return len(my_list)` against `list_length`.
// Shared by the debugger and CLI tests.
export function dynamicDump(callee = "len"): unknown {
  return {
    _type: "Module",
    body: [
      {
        _type: "FunctionDef",
        name: "count",
        lineno: 1,
        col_offset: 0,
        args: { _type: "arguments", args: [{ _type: "arg", arg: "my_list" }] },
        body: [
          {
            _type: "Return",
            lineno: 2,
            col_offset: 4,
            value: {
              _type: "Call",
              lineno: 2,
              col_offset: 11,
              func: { _type: "Name", id: callee },
              args: [{ _type: "Name", id: "my_list" }],
              keywords: [],
            },
          },
        ],
      },
    ],
  };
}

export function systemsDump(name = "list_length"): unknown {
  return {
    kind: "TranslationUnitDecl",
    inner: [
      {
        kind: "FunctionDecl",
        name,
        loc: { file: "list.c", line: 3, col: 12 },
        type: { qualType: "Py_ssize_t (PyListObject *)" },
        inner: [{ kind: "ParmVarDecl", name: "list", loc: { col: 38 }, type: { qualType: "PyListObject *" } }],
      },
    ],
  };
}
