import type { DynamicModule, SystemsTranslationUnit, UnifiedNode } from "@seam/core";
import type { Diagnostic } from "@seam/compiler";

import type { Phase } from "./phases.js";

/** One completed phase transition. */
export type Transformation = {
  readonly step: number;
  readonly from: Phase;
  readonly to: Phase;
  readonly summary: string;
  // Boundaries that turned eliminated during this step.
  readonly boundariesEliminated: number;
};

/** A failed step, kept until acknowledged. `phase` is the phase that was being entered. */
export type PendingError = {
  readonly phase: Phase;
  readonly message: string;
};

export type TranspilationState = {
  readonly phase: Phase;
  readonly stepCount: number;
  readonly history: readonly Transformation[];
  readonly dynamicFile: string;
  readonly systemsFile: string;
  readonly dynamicSource: unknown;
  readonly systemsSource: unknown;
  readonly dynamicHir?: DynamicModule;
  readonly systemsHir?: SystemsTranslationUnit;
  readonly unifiedHir?: UnifiedNode;
  readonly optimizedHir?: UnifiedNode;
  readonly generatedText?: string;
  readonly diagnostics: readonly Diagnostic[];
  readonly error?: PendingError;
};

export function initialState(init: {
  readonly dynamicSource: unknown;
  readonly systemsSource: unknown;
  readonly dynamicFile: string;
  readonly systemsFile: string;
}): TranspilationState {
  const state: TranspilationState = {
    phase: "Start",
    stepCount: 0,
    history: Object.freeze([]),
    dynamicFile: init.dynamicFile,
    systemsFile: init.systemsFile,
    dynamicSource: init.dynamicSource,
    systemsSource: init.systemsSource,
    diagnostics: Object.freeze([]),
  };
  return Object.freeze(state);
}
