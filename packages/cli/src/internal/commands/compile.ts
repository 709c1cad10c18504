import { writeFileSync } from "node:fs";

import type { Diagnostic } from "@seam/compiler";
import { compile, formatCompileFailure } from "@seam/compiler";

import type { DumpSpawn } from "../ast-dump.js";
import { parseFlags } from "../args.js";
import { CommandFailed } from "../errors.js";
import { loadTrees, outputPath, resolveInputs } from "../inputs.js";

export const COMPILE_USAGE =
  "seam compile [--dynamic <file>] [--systems <file>] [--out <file>] [--patterns <file>] [--fallback-receiver <name>]";

export type CompileArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
  readonly spawn?: DumpSpawn;
};

export type CompileRun = {
  readonly code: string;
  readonly diagnostics: readonly Diagnostic[];
  // Set when the code was written to a file instead of returned for printing.
  readonly outFile?: string;
};

export function runCompile(args: CompileArgs): CompileRun {
  const flags = parseFlags("compile", args.argv, {
    values: ["--dynamic", "--systems", "--out", "--patterns", "--fallback-receiver"],
    usage: COMPILE_USAGE,
  });
  const inputs = resolveInputs("compile", args.dir, flags);
  const trees = loadTrees(inputs, args.spawn);

  const result = compile({
    dynamic: trees.dynamic,
    systems: trees.systems,
    registry: inputs.registry,
    ...(inputs.fallbackReceiver !== undefined ? { fallbackReceiver: inputs.fallbackReceiver } : {}),
  });
  if (!result.ok) {
    if (result.error.stage !== "unify") throw result.error.error;
    throw new CommandFailed(formatCompileFailure(result.error, inputs.registry));
  }

  const outFile = outputPath(args.dir, flags, inputs);
  if (outFile !== undefined) writeFileSync(outFile, `${result.value.code}\n`, "utf-8");
  return {
    code: result.value.code,
    diagnostics: result.value.diagnostics,
    ...(outFile !== undefined ? { outFile } : {}),
  };
}
