import { readFileSync } from "node:fs";

import type { Type } from "@seam/core";
import { freezeReadonlyArray } from "@seam/core";

import { CompileError } from "../errors.js";
import type { ShapeFailure } from "../json.js";
import { asArray, asInteger, asRecord, asString, asStringArray, assertKnownKeys } from "../json.js";
import { parseTargetTypeText } from "./type-text.js";

/**
 * One registered equivalence: a dynamic-side operation and a systems-side
 * function known to do the same thing, plus how to render it on the target.
 */
export type PatternEntry = {
  readonly pattern: string;
  readonly dynamicName: string;
  readonly systemsName: string;
  readonly callee: string;
  readonly method: string;
  // Argument slots after the receiver; a leading `&` borrows the argument.
  readonly template: readonly string[];
  readonly arity: { readonly min: number; readonly max: number };
  readonly resultType: Type;
  readonly resultTypeText: string;
  readonly description: string;
};

export type PatternRegistry = {
  readonly documentation: string;
  readonly patterns: readonly PatternEntry[];
};

export const MAX_SUGGESTIONS = 5;
export const FALLBACK_SUGGESTIONS = 3;

const ENTRY_KEYS = [
  "pattern",
  "dynamicName",
  "systemsName",
  "callee",
  "method",
  "template",
  "arity",
  "resultType",
  "description",
] as const;

function registryFailure(source: string): ShapeFailure {
  return (message: string): never => {
    throw new CompileError("SEM1400", `${source}: ${message}`);
  };
}

function parseEntry(value: unknown, index: number, onFail: ShapeFailure): PatternEntry {
  const label = `'patterns[${index}]'`;
  const raw = asRecord(value, label, onFail);
  assertKnownKeys(raw, ENTRY_KEYS, label, onFail);

  const arityRaw = asRecord(raw.arity, `${label}.arity`, onFail);
  assertKnownKeys(arityRaw, ["min", "max"], `${label}.arity`, onFail);
  const min = asInteger(arityRaw.min, `${label}.arity.min`, onFail);
  const max = asInteger(arityRaw.max, `${label}.arity.max`, onFail);
  if (min < 0 || max < min) onFail(`${label}.arity must satisfy 0 <= min <= max.`);

  const template = asStringArray(raw.template, `${label}.template`, onFail);
  if (template.length > Math.max(0, max - 1)) {
    onFail(`${label}.template has ${template.length} slot(s) but arity.max allows ${Math.max(0, max - 1)}.`);
  }

  const resultTypeText = asString(raw.resultType, `${label}.resultType`, onFail);
  const resultType = parseTargetTypeText(resultTypeText);

  return Object.freeze({
    pattern: asString(raw.pattern, `${label}.pattern`, onFail),
    dynamicName: asString(raw.dynamicName, `${label}.dynamicName`, onFail),
    systemsName: asString(raw.systemsName, `${label}.systemsName`, onFail),
    callee: asString(raw.callee, `${label}.callee`, onFail),
    method: asString(raw.method, `${label}.method`, onFail),
    template: freezeReadonlyArray(template),
    arity: Object.freeze({ min, max }),
    resultType: resultType.ok ? resultType.value : onFail(`${label}.resultType: ${resultType.error}`),
    resultTypeText,
    description: asString(raw.description, `${label}.description`, onFail),
  });
}

export function parsePatternRegistry(value: unknown, source = "patterns.json"): PatternRegistry {
  const onFail = registryFailure(source);
  const root = asRecord(value, "root", onFail);
  assertKnownKeys(root, ["schema", "documentation", "patterns"], "root", onFail);
  if (root.schema !== 1) onFail("unsupported schema.");

  const documentation = asString(root.documentation, "'documentation'", onFail);
  const patterns = asArray(root.patterns, "'patterns'", onFail).map((p, i) => parseEntry(p, i, onFail));

  const ids = new Set<string>();
  const pairs = new Set<string>();
  for (const p of patterns) {
    if (ids.has(p.pattern)) onFail(`duplicate pattern id '${p.pattern}'.`);
    ids.add(p.pattern);
    const pair = `${p.dynamicName}\u0000${p.systemsName}`;
    if (pairs.has(pair)) onFail(`duplicate name pair '${p.dynamicName}' + '${p.systemsName}'.`);
    pairs.add(pair);
  }

  return Object.freeze({ documentation, patterns: freezeReadonlyArray(patterns) });
}

export function loadPatternRegistry(path: string | URL): PatternRegistry {
  const raw = readFileSync(path, "utf-8");
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (e: unknown) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new CompileError("SEM1400", `${String(path)}: invalid JSON (${detail}).`);
  }
  return parsePatternRegistry(value, String(path));
}

let defaultRegistry: PatternRegistry | undefined;

/** The bundled pattern table, read once per process. */
export function defaultPatternRegistry(): PatternRegistry {
  defaultRegistry ??= loadPatternRegistry(new URL("./patterns.json", import.meta.url));
  return defaultRegistry;
}

export function allPatterns(registry: PatternRegistry = defaultPatternRegistry()): readonly PatternEntry[] {
  return registry.patterns;
}

export function findPattern(
  dynamicName: string,
  systemsName: string,
  registry: PatternRegistry = defaultPatternRegistry()
): PatternEntry | undefined {
  return registry.patterns.find((p) => p.dynamicName === dynamicName && p.systemsName === systemsName);
}

export function findPatternById(
  pattern: string,
  registry: PatternRegistry = defaultPatternRegistry()
): PatternEntry | undefined {
  return registry.patterns.find((p) => p.pattern === pattern);
}

function related(a: string, b: string): boolean {
  return a.includes(b) || b.includes(a);
}

/**
 * Entries whose dynamic or systems name contains the requested name (or is
 * contained by it), in registry order, at most five. With no such entry, the
 * first three registered entries.
 */
export function suggestPatterns(
  dynamicName: string,
  systemsName: string,
  registry: PatternRegistry = defaultPatternRegistry()
): readonly PatternEntry[] {
  const matches = [
    ...registry.patterns.filter((p) => related(p.dynamicName, dynamicName)),
    ...registry.patterns.filter((p) => related(p.systemsName, systemsName)),
  ];
  const unique = [...new Set(matches)];
  if (unique.length === 0) return freezeReadonlyArray(registry.patterns.slice(0, FALLBACK_SUGGESTIONS));
  return freezeReadonlyArray(unique.slice(0, MAX_SUGGESTIONS));
}

export function formatPattern(p: PatternEntry): string {
  return `${p.dynamicName}() + ${p.systemsName}() → ${p.callee}()`;
}
