#!/usr/bin/env node
import { argv, cwd, exit, stdin, stdout } from "node:process";
import { pathToFileURL } from "node:url";

import { CompileError, formatCompileError, formatDiagnostic } from "@seam/compiler";

import { COMPILE_USAGE, runCompile } from "./internal/commands/compile.js";
import { DEBUG_USAGE, runDebug } from "./internal/commands/debug.js";
import { PATTERNS_USAGE, runPatterns } from "./internal/commands/patterns.js";
import { VISUALIZE_USAGE, runVisualize } from "./internal/commands/visualize.js";

export type Cmd = "compile" | "debug" | "visualize" | "patterns" | "help";

export function usage(): string {
  return [
    "seam: unify dynamic calls with their systems implementations",
    "",
    "Usage:",
    `  ${COMPILE_USAGE}`,
    `  ${DEBUG_USAGE}`,
    `  ${VISUALIZE_USAGE}`,
    `  ${PATTERNS_USAGE}`,
    "  seam help",
    "",
    "Inputs are .json AST dumps, .py files (dumped with python3) or .c files (dumped with clang).",
    "Options not given on the command line are read from the nearest seam.json.",
    "",
  ].join("\n");
}

export function parseCommand(args: readonly string[]): Cmd {
  const [cmd] = args;
  if (cmd === "compile" || cmd === "debug" || cmd === "visualize" || cmd === "patterns" || cmd === "help") return cmd;
  return "help";
}

/** Compile errors carry their location; other failures print their message. */
export function formatFailure(err: unknown): string {
  if (err instanceof CompileError) return formatCompileError(err);
  if (err instanceof Error) return err.message;
  return String(err);
}

export async function main(): Promise<void> {
  const args = argv.slice(2);
  try {
    const cmd = parseCommand(args);
    switch (cmd) {
      case "compile": {
        const run = runCompile({ dir: cwd(), argv: args.slice(1) });
        for (const d of run.diagnostics) console.error(formatDiagnostic(d));
        if (run.outFile !== undefined) console.error(`Wrote ${run.outFile}`);
        else console.log(run.code);
        return;
      }
      case "debug":
        await runDebug({ dir: cwd(), argv: args.slice(1), input: stdin, output: stdout, echo: !stdin.isTTY });
        return;
      case "visualize":
        console.log(runVisualize({ dir: cwd(), argv: args.slice(1) }));
        return;
      case "patterns":
        console.log(runPatterns({ dir: cwd(), argv: args.slice(1) }));
        return;
      default:
        console.log(usage());
        if (args.length > 0 && args[0] !== "help") exit(1);
    }
  } catch (err: unknown) {
    console.error(formatFailure(err));
    exit(1);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
