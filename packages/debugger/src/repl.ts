import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

import { formatBreakpoint } from "./breakpoints.js";
import type { Command } from "./commands.js";
import { parseCommand } from "./commands.js";
import { phaseDisplayName } from "./phases.js";
import { helpText, inspect, renderBreakpoints, renderError, renderHistory, visualize } from "./render.js";
import type { Stepper } from "./stepper.js";

export const PROMPT = "(seam-debug) ";

export type ReplOptions = {
  readonly input: Readable;
  readonly output: Writable;
  // Write each line after the prompt, for transcripts of piped input.
  readonly echo?: boolean;
};

export type CommandResult = {
  readonly output: string;
  readonly quit: boolean;
};

function pendingError(stepper: Stepper): string {
  return renderError(stepper.state) ?? "";
}

/** Runs one command against the stepper and returns what the REPL prints. */
export function handleCommand(stepper: Stepper, command: Command): CommandResult {
  const done = (output: string): CommandResult => ({ output, quit: false });
  switch (command.kind) {
    case "step": {
      const outcome = stepper.step();
      switch (outcome.kind) {
        case "idle":
          return done("Transpilation complete; nothing left to step.");
        case "blocked":
        case "failed":
          return done(pendingError(stepper));
        case "advanced":
          return done(
            [
              `═══ Step ${outcome.transformation.step} ═══`,
              `Phase: ${phaseDisplayName(outcome.phase)}`,
              `  ${outcome.transformation.summary}`,
            ].join("\n")
          );
      }
    }
    case "continue": {
      const outcome = stepper.continueUntilBreakpoint();
      switch (outcome.kind) {
        case "breakpoint":
          return done(
            [
              `Breakpoint [${outcome.index}] hit: ${formatBreakpoint(outcome.breakpoint)}`,
              `Phase: ${phaseDisplayName(outcome.transformation.to)}`,
            ].join("\n")
          );
        case "complete":
          return done(`Transpilation complete.\nPhase: ${phaseDisplayName(stepper.state.phase)}`);
        case "blocked":
        case "failed":
          return done(pendingError(stepper));
      }
    }
    case "visualize":
      return done(visualize(stepper.state));
    case "inspect":
      return done(inspect(stepper.state, command.target));
    case "break":
      stepper.addBreakpoint(command.breakpoint);
      return done(`Breakpoint added: ${formatBreakpoint(command.breakpoint)}`);
    case "list":
      return done(renderBreakpoints(stepper.breakpoints));
    case "clear":
      return done(
        stepper.clearBreakpoint(command.index)
          ? `Cleared breakpoint: ${command.index}`
          : `Invalid breakpoint: ${command.index}`
      );
    case "ack":
      return done(stepper.acknowledgeError() ? "Error acknowledged." : "No pending error.");
    case "history":
      return done(renderHistory(stepper.state.history));
    case "help":
      return done(helpText());
    case "quit":
      return { output: "", quit: true };
  }
}

function header(): string {
  const rule = "═══════════════════════════════════════";
  return [rule, "   Seam Interactive Debugger", rule, "", "Type 'help' for help, 'step' to step, 'quit' to quit", ""].join(
    "\n"
  );
}

/**
 * Line-oriented debugger loop. Ends on `quit` or at the end of input; never
 * closes the output stream.
 */
export async function runRepl(stepper: Stepper, options: ReplOptions): Promise<void> {
  const { output } = options;
  const write = (text: string): void => {
    output.write(text);
  };
  const rl = createInterface({ input: options.input, terminal: false });

  write(`${header()}\n`);
  write(PROMPT);
  try {
    for await (const line of rl) {
      if (options.echo === true) write(`${line.trim()}\n`);
      const parsed = parseCommand(line);
      if (!parsed.ok) {
        write(`Error: ${parsed.error}\n`);
      } else {
        const result = handleCommand(stepper, parsed.value);
        if (result.quit) break;
        if (result.output.length > 0) write(`${result.output}\n`);
      }
      write(`\n${PROMPT}`);
    }
  } finally {
    rl.close();
  }
  write("\nExiting debugger.\n");
}
