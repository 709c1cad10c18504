import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

export const CONFIG_FILE = "seam.json";

export type SeamConfig = {
  readonly schema: 1;
  readonly dynamic?: string;
  readonly systems?: string;
  readonly out?: string;
  // Path to a pattern table that replaces the bundled one.
  readonly patterns?: string;
  readonly fallbackReceiver?: string;
  readonly breakpoints?: readonly string[];
  // Extra clang flags for `.c` inputs, e.g. the Python include directory.
  readonly clangFlags?: readonly string[];
};

export type ConfigContext = {
  readonly root: string;
  readonly path: string;
  readonly config: SeamConfig;
};

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be a JSON object.`);
  }
  return Object.fromEntries(Object.entries(value));
}

function assertKnownKeys(value: Record<string, unknown>, allowed: readonly string[], label: string): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new Error(`${label}: unknown key '${key}'.`);
    }
  }
}

function asString(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${label} must be a non-empty string.`);
  }
  return value;
}

function asStringArray(value: unknown, label: string): readonly string[] {
  if (!Array.isArray(value)) throw new Error(`${label} must be an array of non-empty strings.`);
  const out: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string" || entry.length === 0) {
      throw new Error(`${label} must be an array of non-empty strings.`);
    }
    out.push(entry);
  }
  return out;
}

function optionalString(value: unknown, label: string): string | undefined {
  return value === undefined ? undefined : asString(value, label);
}

export function parseSeamConfig(value: unknown): SeamConfig {
  const root = asRecord(value, CONFIG_FILE);
  assertKnownKeys(
    root,
    ["schema", "dynamic", "systems", "out", "patterns", "fallbackReceiver", "breakpoints", "clangFlags"],
    CONFIG_FILE
  );
  if (root.schema !== 1) {
    throw new Error(`Unsupported ${CONFIG_FILE} schema.`);
  }

  const dynamic = optionalString(root.dynamic, `${CONFIG_FILE}: 'dynamic'`);
  const systems = optionalString(root.systems, `${CONFIG_FILE}: 'systems'`);
  const out = optionalString(root.out, `${CONFIG_FILE}: 'out'`);
  const patterns = optionalString(root.patterns, `${CONFIG_FILE}: 'patterns'`);
  const fallbackReceiver = optionalString(root.fallbackReceiver, `${CONFIG_FILE}: 'fallbackReceiver'`);
  if (fallbackReceiver !== undefined && !/^[A-Za-z_][A-Za-z0-9_]*$/.test(fallbackReceiver)) {
    throw new Error(`${CONFIG_FILE}: 'fallbackReceiver' must be an identifier.`);
  }
  const breakpoints =
    root.breakpoints === undefined ? undefined : asStringArray(root.breakpoints, `${CONFIG_FILE}: 'breakpoints'`);
  const clangFlags =
    root.clangFlags === undefined ? undefined : asStringArray(root.clangFlags, `${CONFIG_FILE}: 'clangFlags'`);

  return {
    schema: 1,
    ...(dynamic !== undefined ? { dynamic } : {}),
    ...(systems !== undefined ? { systems } : {}),
    ...(out !== undefined ? { out } : {}),
    ...(patterns !== undefined ? { patterns } : {}),
    ...(fallbackReceiver !== undefined ? { fallbackReceiver } : {}),
    ...(breakpoints !== undefined ? { breakpoints } : {}),
    ...(clangFlags !== undefined ? { clangFlags } : {}),
  };
}

/** Nearest directory at or above `fromDir` holding a `seam.json`. */
export function findConfigRoot(fromDir: string): string | undefined {
  let cur = resolve(fromDir);
  while (true) {
    if (existsSync(join(cur, CONFIG_FILE))) return cur;
    const parent = dirname(cur);
    if (parent === cur) return undefined;
    cur = parent;
  }
}

export function loadSeamConfig(path: string): SeamConfig {
  const raw = readFileSync(path, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e: unknown) {
    if (e instanceof SyntaxError) throw new Error(`${path}: invalid JSON (${e.message}).`);
    throw e;
  }
  return parseSeamConfig(parsed);
}

/**
 * Loads the nearest `seam.json`, if any. Paths inside it stay as written;
 * resolve them against `root`.
 */
export function loadConfigContext(fromDir: string): ConfigContext | undefined {
  const root = findConfigRoot(fromDir);
  if (root === undefined) return undefined;
  const path = join(root, CONFIG_FILE);
  return { root, path, config: loadSeamConfig(path) };
}
