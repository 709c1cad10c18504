import type { Language, SourceLocation } from "@seam/core";
import { languageDisplayName } from "@seam/core";

import type { CompilerDiagnosticCode } from "../diagnostics.js";
import type { PatternEntry } from "../patterns/registry.js";
import { MAX_SUGGESTIONS, defaultPatternRegistry, formatPattern } from "../patterns/registry.js";

export type UnificationError =
  | {
      readonly kind: "noPatternMatch";
      readonly dynamicName: string;
      readonly systemsName: string;
      readonly suggestions: readonly PatternEntry[];
      readonly location?: SourceLocation;
    }
  | {
      readonly kind: "incompatibleNodes";
      readonly dynamicKind: string;
      readonly systemsKind: string;
      readonly location?: SourceLocation;
    }
  | {
      readonly kind: "unsupportedConstruct";
      readonly domain: Language;
      readonly nodeKind: string;
      readonly location?: SourceLocation;
    };

export function unificationErrorCode(error: UnificationError): CompilerDiagnosticCode {
  switch (error.kind) {
    case "noPatternMatch":
      return "SEM1100";
    case "incompatibleNodes":
      return "SEM1101";
    case "unsupportedConstruct":
      return "SEM1102";
  }
}

/** First line of the rendered message. */
export function unificationErrorSummary(error: UnificationError): string {
  switch (error.kind) {
    case "noPatternMatch":
      return `Cannot match dynamic function '${error.dynamicName}' with systems function '${error.systemsName}'`;
    case "incompatibleNodes":
      return `Cannot unify incompatible node kinds: dynamic ${error.dynamicKind} with systems ${error.systemsKind}`;
    case "unsupportedConstruct":
      return `Unsupported ${languageDisplayName(error.domain).toLowerCase()} construct: ${error.nodeKind}`;
  }
}

function attemptedSection(error: UnificationError): readonly string[] {
  switch (error.kind) {
    case "noPatternMatch":
      return ["Tried to unify:", `  Dynamic: ${error.dynamicName}()`, `  Systems: ${error.systemsName}()`];
    case "incompatibleNodes":
      return ["Tried to unify:", `  Dynamic: ${error.dynamicKind}`, `  Systems: ${error.systemsKind}`];
    case "unsupportedConstruct":
      return ["Tried to convert:", `  ${languageDisplayName(error.domain)}: ${error.nodeKind}`];
  }
}

function alternativesSection(error: UnificationError): readonly string[] {
  switch (error.kind) {
    case "noPatternMatch": {
      const lines = ["No known pattern matches this combination."];
      if (error.suggestions.length > 0) {
        lines.push("", "Supported patterns:");
        error.suggestions.slice(0, MAX_SUGGESTIONS).forEach((s, i) => lines.push(`  ${i + 1}. ${formatPattern(s)}`));
      }
      return lines;
    }
    case "incompatibleNodes":
      return [
        "Both inputs must be callable: a dynamic call and a systems function definition.",
        "Make sure the two inputs describe the same operation.",
      ];
    case "unsupportedConstruct":
      return error.domain === "dynamic"
        ? ["Supported: calls to registered operations, with plain names or literals as arguments."]
        : ["Supported: function definitions."];
  }
}

/**
 * Renders the error as a multi-section message: problem, attempted inputs,
 * supported alternatives and a documentation pointer.
 */
export function formatUnificationError(
  error: UnificationError,
  documentation: string = defaultPatternRegistry().documentation
): string {
  const lines = [
    unificationErrorSummary(error),
    "",
    ...attemptedSection(error),
    "",
    ...alternativesSection(error),
    "",
    "For custom patterns, see:",
    `  ${documentation}`,
    "",
  ];
  return lines.join("\n");
}
