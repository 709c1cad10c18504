import type { Language } from "./language.js";
import { freezeReadonlyArray } from "./freeze.js";

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly language: Language;
};

export function sourceLocation(file: string, line: number, column: number, language: Language): SourceLocation {
  return Object.freeze({ file, line, column, language });
}

export function formatSourceLocation(loc: SourceLocation): string {
  return `${loc.file}:${loc.line}:${loc.column}`;
}

/**
 * Per-node metadata. Attached when a node is created and read by the debugger's
 * `inspect`/`visualize` renderers. Never mutated; `withDebugNote` returns a copy.
 */
export type Metadata = {
  readonly sourceLocation?: SourceLocation;
  readonly patternUsed?: string;
  readonly debugNotes: readonly string[];
};

export const EMPTY_METADATA: Metadata = Object.freeze({
  debugNotes: freezeReadonlyArray<string>([]),
});

export function metadata(init: {
  readonly sourceLocation?: SourceLocation;
  readonly patternUsed?: string;
  readonly debugNotes?: readonly string[];
} = {}): Metadata {
  return Object.freeze({
    debugNotes: freezeReadonlyArray(init.debugNotes ?? []),
    ...(init.sourceLocation ? { sourceLocation: init.sourceLocation } : {}),
    ...(init.patternUsed !== undefined ? { patternUsed: init.patternUsed } : {}),
  });
}

export function withDebugNote(meta: Metadata, note: string): Metadata {
  return metadata({ ...meta, debugNotes: [...meta.debugNotes, note] });
}
