import { resolve } from "node:path";

import { allPatterns, defaultPatternRegistry, formatPattern, loadPatternRegistry } from "@seam/compiler";

import { parseFlags } from "../args.js";
import { loadConfigContext } from "../config.js";

export const PATTERNS_USAGE = "seam patterns [--patterns <file>]";

export type PatternsArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
};

/** The pattern table as printed by `seam patterns`. */
export function runPatterns(args: PatternsArgs): string {
  const flags = parseFlags("patterns", args.argv, { values: ["--patterns"], usage: PATTERNS_USAGE });
  const flag = flags.values.get("patterns");
  const context = flag === undefined ? loadConfigContext(args.dir) : undefined;
  const path =
    flag !== undefined
      ? resolve(args.dir, flag)
      : context?.config.patterns !== undefined
        ? resolve(context.root, context.config.patterns)
        : undefined;
  const registry = path === undefined ? defaultPatternRegistry() : loadPatternRegistry(path);

  const rows = allPatterns(registry).map(
    (p, i) => `  ${String(i + 1).padStart(2)}. ${formatPattern(p)} : ${p.resultTypeText}  [${p.pattern}]`
  );
  return ["Supported patterns:", ...rows, "", "For custom patterns, see:", `  ${registry.documentation}`].join("\n");
}
