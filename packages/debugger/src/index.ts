export type { Breakpoint } from "./breakpoints.js";
export { breakpointMatches, formatBreakpoint } from "./breakpoints.js";
export type { Command } from "./commands.js";
export { parseCommand } from "./commands.js";
export type { Phase, StepPhase } from "./phases.js";
export { PHASES, nextPhase, parsePhaseName, phaseDisplayName, phaseIndex } from "./phases.js";
export {
  INSPECT_TARGET_NAMES,
  helpText,
  inspect,
  renderBreakpoints,
  renderDynamic,
  renderError,
  renderHistory,
  renderSystems,
  renderTransformation,
  renderUnified,
  visualize,
} from "./render.js";
export type { CommandResult, ReplOptions } from "./repl.js";
export { PROMPT, handleCommand, runRepl } from "./repl.js";
export type { PendingError, Transformation, TranspilationState } from "./state.js";
export { initialState } from "./state.js";
export type { ContinueOutcome, StepOutcome, StepperOptions } from "./stepper.js";
export { Stepper } from "./stepper.js";
