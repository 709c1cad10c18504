import type { Readable, Writable } from "node:stream";

import type { Breakpoint } from "@seam/debugger";
import { Stepper, parseCommand, runRepl } from "@seam/debugger";

import type { DumpSpawn } from "../ast-dump.js";
import { parseFlags } from "../args.js";
import { loadDumps, resolveInputs, sourceLabel } from "../inputs.js";

export const DEBUG_USAGE =
  "seam debug [--dynamic <file>] [--systems <file>] [--break <spec>]... [--patterns <file>] [--fallback-receiver <name>]";

export type DebugArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
  readonly input: Readable;
  readonly output: Writable;
  // Echo commands read from a pipe so transcripts show them.
  readonly echo?: boolean;
  readonly spawn?: DumpSpawn;
};

/** A breakpoint written the way the REPL's `break` takes it: `boundary`, `phase Optimized`, `fn name`. */
export function parseBreakpointSpec(spec: string): Breakpoint {
  const parsed = parseCommand(`break ${spec}`);
  if (!parsed.ok) throw new Error(`Invalid breakpoint '${spec}': ${parsed.error}`);
  if (parsed.value.kind !== "break") throw new Error(`Invalid breakpoint '${spec}'.`);
  return parsed.value.breakpoint;
}

/**
 * Sets up a stepper from the inputs and hands it to the REPL. The AST dumps
 * are converted inside the stepper, one phase at a time.
 */
export async function runDebug(args: DebugArgs): Promise<Stepper> {
  const flags = parseFlags("debug", args.argv, {
    values: ["--dynamic", "--systems", "--patterns", "--fallback-receiver"],
    lists: ["--break"],
    usage: DEBUG_USAGE,
  });
  const inputs = resolveInputs("debug", args.dir, flags);
  const breakpoints = [...(inputs.context?.config.breakpoints ?? []), ...(flags.lists.get("break") ?? [])].map(
    parseBreakpointSpec
  );
  const dumps = loadDumps(inputs, args.spawn);

  const stepper = new Stepper({
    dynamic: dumps.dynamic,
    systems: dumps.systems,
    dynamicFile: sourceLabel(inputs.dynamicPath),
    systemsFile: sourceLabel(inputs.systemsPath),
    registry: inputs.registry,
    ...(inputs.fallbackReceiver !== undefined ? { fallbackReceiver: inputs.fallbackReceiver } : {}),
  });
  for (const bp of breakpoints) stepper.addBreakpoint(bp);

  await runRepl(stepper, { input: args.input, output: args.output, echo: args.echo ?? false });
  return stepper;
}
