import type { Result } from "@seam/core";
import { err, ok } from "@seam/core";

import type { Breakpoint } from "./breakpoints.js";
import { parsePhaseName } from "./phases.js";

export type Command =
  | { readonly kind: "step" }
  | { readonly kind: "continue" }
  | { readonly kind: "visualize" }
  | { readonly kind: "inspect"; readonly target: string }
  | { readonly kind: "break"; readonly breakpoint: Breakpoint }
  | { readonly kind: "list" }
  | { readonly kind: "clear"; readonly index: number }
  | { readonly kind: "ack" }
  | { readonly kind: "history" }
  | { readonly kind: "help" }
  | { readonly kind: "quit" };

function parseBreakpoint(parts: readonly string[]): Result<Command, string> {
  const [kind = "", ...rest] = parts;
  switch (kind.toLowerCase()) {
    case "boundary":
      return ok({ kind: "break", breakpoint: { kind: "boundaryElimination" } });
    case "phase": {
      if (rest.length === 0) return err("break phase requires phase name");
      const name = rest.join(" ");
      const phase = parsePhaseName(name);
      if (!phase) return err(`Unknown phase: '${name}'`);
      return ok({ kind: "break", breakpoint: { kind: "phase", name, phase } });
    }
    case "function":
    case "fn": {
      const [name] = rest;
      if (name === undefined) return err("break function requires function name");
      return ok({ kind: "break", breakpoint: { kind: "function", name } });
    }
    default:
      return err(`Unknown breakpoint type: '${kind}'`);
  }
}

/** Parses one REPL line. An empty line means `step`. */
export function parseCommand(input: string): Result<Command, string> {
  const parts = input.trim().split(/\s+/).filter((p) => p.length > 0);
  const [head, ...rest] = parts;
  if (head === undefined) return ok({ kind: "step" });

  switch (head.toLowerCase()) {
    case "step":
    case "s":
      return ok({ kind: "step" });
    case "continue":
    case "c":
      return ok({ kind: "continue" });
    case "visualize":
    case "v":
      return ok({ kind: "visualize" });
    case "inspect":
    case "i":
      if (rest.length === 0) return err("inspect requires a target");
      return ok({ kind: "inspect", target: rest.join(" ").toLowerCase() });
    case "break":
    case "b":
      if (rest.length === 0) return err("break requires a breakpoint type");
      return parseBreakpoint(rest);
    case "list":
    case "l":
      return ok({ kind: "list" });
    case "clear": {
      const [index] = rest;
      if (index === undefined) return err("clear requires breakpoint number");
      if (!/^\d+$/.test(index)) return err("Invalid breakpoint number");
      return ok({ kind: "clear", index: Number(index) });
    }
    case "ack":
    case "a":
      return ok({ kind: "ack" });
    case "history":
      return ok({ kind: "history" });
    case "help":
    case "h":
    case "?":
      return ok({ kind: "help" });
    case "quit":
    case "q":
    case "exit":
      return ok({ kind: "quit" });
    default:
      return err(`Unknown command: '${head}'. Type 'help' for commands.`);
  }
}
