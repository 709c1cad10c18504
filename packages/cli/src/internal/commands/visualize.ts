import { extname, resolve } from "node:path";

import { convertDynamicAst, convertSystemsAst, isJsonRecord } from "@seam/compiler";
import { renderDynamic, renderSystems } from "@seam/debugger";

import type { DumpSpawn } from "../ast-dump.js";
import { inputKind, loadAst } from "../ast-dump.js";
import { loadConfigContext } from "../config.js";
import { sourceLabel } from "../inputs.js";

export const VISUALIZE_USAGE = "seam visualize <file>";

export type VisualizeArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
  readonly spawn?: DumpSpawn;
};

type Side = "dynamic" | "systems";

/**
 * Which frontend reads `file`: source files by extension, saved dumps by the
 * extension they were made from (`app.py.json`), then by their root node.
 */
export function visualizeSide(file: string, ast: unknown): Side {
  const kind = inputKind(file);
  if (kind === "python") return "dynamic";
  if (kind === "c") return "systems";
  const origin = extname(sourceLabel(file)).toLowerCase();
  if (origin === ".py") return "dynamic";
  if (origin === ".c" || origin === ".h") return "systems";
  if (isJsonRecord(ast) && typeof ast._type === "string") return "dynamic";
  if (isJsonRecord(ast) && typeof ast.kind === "string") return "systems";
  throw new Error(`${file}: cannot tell a Python AST dump from a clang one; name it <source>.py.json or <source>.c.json.`);
}

/** Outline of one input's HIR, without pairing it with the other side. */
export function runVisualize(args: VisualizeArgs): string {
  const [file, ...rest] = args.argv;
  if (file === undefined || file === "--help" || file === "-h" || rest.length > 0) {
    throw new Error(`Usage: ${VISUALIZE_USAGE}`);
  }
  const path = resolve(args.dir, file);
  const clangFlags = loadConfigContext(args.dir)?.config.clangFlags ?? [];
  const ast = loadAst(path, { clangFlags, ...(args.spawn ? { spawn: args.spawn } : {}) });
  const label = sourceLabel(path);
  const side = visualizeSide(path, ast);

  let tree: string;
  if (side === "dynamic") {
    const hir = convertDynamicAst(ast, label);
    if (!hir.ok) throw hir.error;
    tree = renderDynamic(hir.value);
  } else {
    const hir = convertSystemsAst(ast, label);
    if (!hir.ok) throw hir.error;
    tree = renderSystems(hir.value);
  }

  const heading = side === "dynamic" ? "Dynamic HIR" : "Systems HIR";
  return [`File: ${label}`, `═══ ${heading} ═══`, tree, "", `Nodes: ${tree.split("\n").length}`].join("\n");
}
