// Transpilation phases, visited strictly in this order.
export const PHASES = [
  "Start",
  "DynamicParsed",
  "DynamicHIR",
  "SystemsParsed",
  "SystemsHIR",
  "UnifiedHIR",
  "Optimized",
  "Generated",
  "Complete",
] as const;

export type Phase = (typeof PHASES)[number];

const [, ...LATER_PHASES] = PHASES;

/** Every phase a step can move into. */
export type StepPhase = (typeof LATER_PHASES)[number];

const DISPLAY_NAMES: Readonly<Record<Phase, string>> = {
  Start: "Start",
  DynamicParsed: "Dynamic Parsed",
  DynamicHIR: "Dynamic HIR",
  SystemsParsed: "Systems Parsed",
  SystemsHIR: "Systems HIR",
  UnifiedHIR: "Unified HIR",
  Optimized: "Optimized",
  Generated: "Generated",
  Complete: "Complete",
};

export function phaseDisplayName(phase: Phase): string {
  return DISPLAY_NAMES[phase];
}

export function phaseIndex(phase: Phase): number {
  return PHASES.indexOf(phase);
}

/** The phase after `phase`; `Complete` is terminal and maps to itself. */
export function nextPhase(phase: Phase): StepPhase {
  return LATER_PHASES[phaseIndex(phase)] ?? "Complete";
}

function normalize(name: string): string {
  return name.toLowerCase().replace(/[\s_-]+/g, "");
}

/** Accepts ids (`UnifiedHIR`) and display names (`unified hir`, `unified-hir`). */
export function parsePhaseName(name: string): Phase | undefined {
  const wanted = normalize(name);
  return PHASES.find((p) => normalize(p) === wanted || normalize(DISPLAY_NAMES[p]) === wanted);
}
