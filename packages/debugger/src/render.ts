import type { DynamicNode, SourceLocation, SystemsNode, UnifiedNode } from "@seam/core";
import { formatLiteral, formatType, walkUnified } from "@seam/core";
import { formatDiagnostic } from "@seam/compiler";

import type { Breakpoint } from "./breakpoints.js";
import { formatBreakpoint } from "./breakpoints.js";
import { phaseDisplayName } from "./phases.js";
import type { Transformation, TranspilationState } from "./state.js";

const INDENT = "  ";

function at(loc: SourceLocation | undefined): string {
  return loc ? ` @L${loc.line}` : "";
}

function dynamicLines(node: DynamicNode, depth: number, out: string[]): void {
  const pad = INDENT.repeat(depth);
  switch (node.kind) {
    case "module":
      out.push(`${pad}module ${node.name}`);
      for (const child of node.body) dynamicLines(child, depth + 1, out);
      return;
    case "function":
      out.push(`${pad}function ${node.name}(${node.params.join(", ")})${at(node.meta.sourceLocation)}`);
      for (const child of node.body) dynamicLines(child, depth + 1, out);
      return;
    case "return":
      out.push(`${pad}return${at(node.meta.sourceLocation)}`);
      if (node.value) dynamicLines(node.value, depth + 1, out);
      return;
    case "call": {
      const named = node.callee.kind === "variable" ? ` ${node.callee.name}` : "";
      out.push(`${pad}call${named}${at(node.meta.sourceLocation)}`);
      if (node.callee.kind !== "variable") dynamicLines(node.callee, depth + 1, out);
      for (const arg of node.args) dynamicLines(arg, depth + 1, out);
      return;
    }
    case "variable":
      out.push(`${pad}name ${node.name}`);
      return;
    case "literal":
      out.push(`${pad}literal ${formatLiteral(node.value)}`);
      return;
  }
}

function systemsLines(node: SystemsNode, depth: number, out: string[]): void {
  const pad = INDENT.repeat(depth);
  switch (node.kind) {
    case "translationUnit":
      out.push(`${pad}translationUnit ${node.name}`);
      for (const decl of node.declarations) systemsLines(decl, depth + 1, out);
      return;
    case "function": {
      const params = node.params.map((p) => `${p.name}: ${formatType(p.type)}`).join(", ");
      out.push(`${pad}function ${node.name}(${params}) -> ${formatType(node.returnType)}${at(node.meta.sourceLocation)}`);
      for (const child of node.body) systemsLines(child, depth + 1, out);
      return;
    }
    case "return":
      out.push(`${pad}return${at(node.meta.sourceLocation)}`);
      if (node.value) systemsLines(node.value, depth + 1, out);
      return;
    case "call":
      out.push(`${pad}call ${node.callee}${at(node.meta.sourceLocation)}`);
      for (const arg of node.args) systemsLines(arg, depth + 1, out);
      return;
    case "cpythonMacro":
      out.push(`${pad}cpythonMacro ${node.name}${at(node.meta.sourceLocation)}`);
      for (const arg of node.args) systemsLines(arg, depth + 1, out);
      return;
    case "variable":
      out.push(`${pad}variable ${node.name}`);
      return;
    case "literal":
      out.push(`${pad}literal ${formatLiteral(node.value)}`);
      return;
  }
}

function unifiedLine(node: UnifiedNode): string {
  switch (node.kind) {
    case "module":
      return `module ${node.name}`;
    case "function": {
      const params = node.params.map((p) => `${p.name}: ${formatType(p.paramType)}`).join(", ");
      return `function ${node.name}(${params}) -> ${formatType(node.returnType)}`;
    }
    case "call": {
      const mapping = node.crossMapping;
      const boundary = mapping
        ? ` [boundary: ${mapping.boundaryEliminated ? "eliminated" : "pending"}, pattern: ${mapping.pattern}]`
        : "";
      return `call ${node.callee} : ${formatType(node.inferredType)}${boundary}`;
    }
    case "variable":
      return `variable ${node.name} : ${formatType(node.varType)}`;
    case "literal":
      return `literal ${formatLiteral(node.value)} : ${formatType(node.litType)}`;
  }
}

export function renderDynamic(node: DynamicNode): string {
  const out: string[] = [];
  dynamicLines(node, 0, out);
  return out.join("\n");
}

export function renderSystems(node: SystemsNode): string {
  const out: string[] = [];
  systemsLines(node, 0, out);
  return out.join("\n");
}

/** Indented outline, one node per line, children under their parent. */
export function renderUnified(node: UnifiedNode): string {
  const out: string[] = [];
  walkUnified(node, (n, depth) => out.push(`${INDENT.repeat(depth)}${unifiedLine(n)}`));
  return out.join("\n");
}

function indentBlock(text: string): string[] {
  return text.split("\n").map((line) => `${INDENT}${line}`);
}

type InspectTarget = {
  readonly label: string;
  readonly render: (state: TranspilationState) => string | undefined;
};

const INSPECT_TARGETS: ReadonlyMap<string, InspectTarget> = new Map<string, InspectTarget>([
  ["dynamic", { label: "Dynamic HIR", render: (s) => (s.dynamicHir ? renderDynamic(s.dynamicHir) : undefined) }],
  ["systems", { label: "Systems HIR", render: (s) => (s.systemsHir ? renderSystems(s.systemsHir) : undefined) }],
  ["unified", { label: "Unified HIR", render: (s) => (s.unifiedHir ? renderUnified(s.unifiedHir) : undefined) }],
  ["optimized", { label: "Optimized HIR", render: (s) => (s.optimizedHir ? renderUnified(s.optimizedHir) : undefined) }],
  ["target", { label: "Target code", render: (s) => s.generatedText }],
]);

export const INSPECT_TARGET_NAMES: readonly string[] = [...INSPECT_TARGETS.keys()];

export function inspect(state: TranspilationState, target: string): string {
  const entry = INSPECT_TARGETS.get(target.toLowerCase());
  if (!entry) return `Unknown target: ${target}`;
  return entry.render(state) ?? `${entry.label} not yet available`;
}

export function renderError(state: TranspilationState): string | undefined {
  if (!state.error) return undefined;
  return [
    `Error while entering ${phaseDisplayName(state.error.phase)}:`,
    ...indentBlock(state.error.message.trimEnd()),
    "Type 'ack' to acknowledge it and retry.",
  ].join("\n");
}

export function visualize(state: TranspilationState): string {
  const lines = [`═══ State at Step ${state.stepCount} ═══`, `Phase: ${phaseDisplayName(state.phase)}`];
  for (const [, entry] of INSPECT_TARGETS) {
    const text = entry.render(state);
    if (text === undefined) continue;
    lines.push("", `${entry.label}:`, ...indentBlock(text.trimEnd()));
  }
  if (state.diagnostics.length > 0) {
    lines.push("", "Diagnostics:", ...state.diagnostics.map((d) => `${INDENT}${formatDiagnostic(d)}`));
  }
  const error = renderError(state);
  if (error) lines.push("", error);
  return lines.join("\n");
}

export function renderTransformation(t: Transformation): string {
  const boundaries = t.boundariesEliminated > 0 ? ` [${t.boundariesEliminated} boundary eliminated]` : "";
  return `${t.step}. ${phaseDisplayName(t.from)} → ${phaseDisplayName(t.to)}: ${t.summary}${boundaries}`;
}

export function renderHistory(history: readonly Transformation[]): string {
  if (history.length === 0) return "No transformations yet.";
  return ["History:", ...history.map((t) => `${INDENT}${renderTransformation(t)}`)].join("\n");
}

export function renderBreakpoints(breakpoints: readonly Breakpoint[]): string {
  if (breakpoints.length === 0) return "No breakpoints set.";
  return ["Breakpoints:", ...breakpoints.map((bp, i) => `${INDENT}[${i}]: ${formatBreakpoint(bp)}`)].join("\n");
}

export function helpText(): string {
  return [
    "Available Commands:",
    "  step, s               Step to the next phase (also: empty line)",
    "  continue, c           Continue until a breakpoint or completion",
    "  visualize, v          Show the current state",
    `  inspect, i <target>   Show one artifact (${INSPECT_TARGET_NAMES.join(", ")})`,
    "  break, b boundary     Break when a boundary is eliminated",
    "  break, b phase <name> Break on entering a phase",
    "  break, b fn <name>    Break on a function (accepted, never fires)",
    "  list, l               List breakpoints",
    "  clear <n>             Clear breakpoint n",
    "  ack, a                Acknowledge a pending error",
    "  history               Show completed transitions",
    "  help, h, ?            Show this help",
    "  quit, q, exit         Exit the debugger",
  ].join("\n");
}
