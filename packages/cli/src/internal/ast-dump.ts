import { spawnSync } from "node:child_process";
import { readFileSync } from "node:fs";
import { extname } from "node:path";

export type InputKind = "json" | "python" | "c";

export type DumpSpawn = (
  command: string,
  args: readonly string[],
  opts: { readonly encoding: "utf-8"; readonly maxBuffer: number }
) => { readonly status: number | null; readonly stdout: string; readonly stderr: string; readonly error?: Error };

// Prints `ast.parse(<file>)` as JSON: `_type` per node, fields by name, and
// `lineno`/`col_offset` where present. Constants also carry `_value_type`, the
// value's type name, since JSON cannot tell `1.0` from `1`.
const PYTHON_DUMP_SCRIPT = [
  "import ast, json, sys",
  "def dump(n):",
  "    if isinstance(n, ast.AST):",
  "        out = {'_type': type(n).__name__}",
  "        for k, v in ast.iter_fields(n):",
  "            out[k] = dump(v)",
  "        for k in ('lineno', 'col_offset'):",
  "            if hasattr(n, k):",
  "                out[k] = getattr(n, k)",
  "        if isinstance(n, ast.Constant):",
  "            out['_value_type'] = type(n.value).__name__",
  "        return out",
  "    if isinstance(n, list):",
  "        return [dump(x) for x in n]",
  "    if n is None or isinstance(n, (bool, int, float, str)):",
  "        return n",
  "    return repr(n)",
  "with open(sys.argv[1], encoding='utf-8') as f:",
  "    tree = ast.parse(f.read(), sys.argv[1])",
  "json.dump(dump(tree), sys.stdout)",
].join("\n");

// Dumps of a file that includes Python.h run to tens of megabytes.
const MAX_DUMP_BYTES = 512 * 1024 * 1024;

export function inputKind(file: string): InputKind {
  switch (extname(file).toLowerCase()) {
    case ".json":
      return "json";
    case ".py":
      return "python";
    case ".c":
    case ".h":
      return "c";
    default:
      throw new Error(`${file}: expected a .json AST dump, a .py file or a .c file.`);
  }
}

export function pythonDumpCommand(file: string): { readonly command: string; readonly args: readonly string[] } {
  return { command: "python3", args: ["-c", PYTHON_DUMP_SCRIPT, file] };
}

export function clangDumpCommand(
  file: string,
  extraFlags: readonly string[] = []
): { readonly command: string; readonly args: readonly string[] } {
  return { command: "clang", args: ["-Xclang", "-ast-dump=json", "-fsyntax-only", ...extraFlags, file] };
}

function parseJson(text: string, label: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e: unknown) {
    if (e instanceof SyntaxError) throw new Error(`${label}: invalid JSON (${e.message}).`);
    throw e;
  }
}

const defaultSpawn: DumpSpawn = (command, args, opts) => {
  const res = spawnSync(command, [...args], opts);
  return { status: res.status, stdout: res.stdout, stderr: res.stderr, ...(res.error ? { error: res.error } : {}) };
};

export type LoadAstOptions = {
  readonly spawn?: DumpSpawn;
  // Passed to clang before the file, e.g. `-I/usr/include/python3.12`.
  readonly clangFlags?: readonly string[];
};

/** Reads an AST dump, producing one first for source files. */
export function loadAst(file: string, opts: LoadAstOptions = {}): unknown {
  const kind = inputKind(file);
  if (kind === "json") return parseJson(readFileSync(file, "utf-8"), file);

  const { command, args } = kind === "python" ? pythonDumpCommand(file) : clangDumpCommand(file, opts.clangFlags);
  const res = (opts.spawn ?? defaultSpawn)(command, args, { encoding: "utf-8", maxBuffer: MAX_DUMP_BYTES });
  if (res.error) throw new Error(`${file}: could not run ${command}: ${res.error.message}`);
  if (res.status !== 0) {
    throw new Error(`${file}: ${command} exited with status ${String(res.status)}.\n${res.stderr}`.trimEnd());
  }
  return parseJson(res.stdout, `${file} (${command} output)`);
}
