import { basename, extname, resolve } from "node:path";

import type { DynamicModule, SystemsTranslationUnit } from "@seam/core";
import type { PatternRegistry } from "@seam/compiler";
import { convertDynamicAst, convertSystemsAst, defaultPatternRegistry, loadPatternRegistry } from "@seam/compiler";

import type { DumpSpawn } from "./ast-dump.js";
import { loadAst } from "./ast-dump.js";
import type { ParsedFlags } from "./args.js";
import type { ConfigContext } from "./config.js";
import { loadConfigContext } from "./config.js";

export type ResolvedInputs = {
  readonly dynamicPath: string;
  readonly systemsPath: string;
  readonly registry: PatternRegistry;
  readonly fallbackReceiver?: string;
  readonly clangFlags: readonly string[];
  readonly context?: ConfigContext;
};

/**
 * Name shown in locations for an input: `app.py.json` reads as `app.py`, so
 * a saved dump reports positions in the file it was made from.
 */
export function sourceLabel(path: string): string {
  const name = basename(path);
  if (extname(name) === ".json" && extname(basename(name, ".json")) !== "") return basename(name, ".json");
  return name;
}

function pick(
  flags: ParsedFlags,
  context: ConfigContext | undefined,
  dir: string,
  key: "dynamic" | "systems" | "patterns" | "out"
): string | undefined {
  const flag = flags.values.get(key);
  if (flag !== undefined) return resolve(dir, flag);
  const fromConfig = context?.config[key];
  return context && fromConfig !== undefined ? resolve(context.root, fromConfig) : undefined;
}

/** Flags first, then the nearest `seam.json`. */
export function resolveInputs(command: string, dir: string, flags: ParsedFlags): ResolvedInputs {
  const context = loadConfigContext(dir);
  const dynamicPath = pick(flags, context, dir, "dynamic");
  const systemsPath = pick(flags, context, dir, "systems");
  if (dynamicPath === undefined) {
    throw new Error(`${command}: no dynamic input; pass --dynamic <file> or set 'dynamic' in seam.json.`);
  }
  if (systemsPath === undefined) {
    throw new Error(`${command}: no systems input; pass --systems <file> or set 'systems' in seam.json.`);
  }
  const patterns = pick(flags, context, dir, "patterns");
  const fallbackReceiver = flags.values.get("fallback-receiver") ?? context?.config.fallbackReceiver;
  return {
    dynamicPath,
    systemsPath,
    registry: patterns === undefined ? defaultPatternRegistry() : loadPatternRegistry(patterns),
    ...(fallbackReceiver !== undefined ? { fallbackReceiver } : {}),
    clangFlags: context?.config.clangFlags ?? [],
    ...(context ? { context } : {}),
  };
}

export function outputPath(dir: string, flags: ParsedFlags, inputs: ResolvedInputs): string | undefined {
  return pick(flags, inputs.context, dir, "out");
}

export type LoadedTrees = {
  readonly dynamic: DynamicModule;
  readonly systems: SystemsTranslationUnit;
};

export function loadDumps(inputs: ResolvedInputs, spawn?: DumpSpawn): { readonly dynamic: unknown; readonly systems: unknown } {
  const opts = { clangFlags: inputs.clangFlags, ...(spawn ? { spawn } : {}) };
  return { dynamic: loadAst(inputs.dynamicPath, opts), systems: loadAst(inputs.systemsPath, opts) };
}

/** Converts both inputs; a conversion failure is thrown as its `CompileError`. */
export function loadTrees(inputs: ResolvedInputs, spawn?: DumpSpawn): LoadedTrees {
  const dumps = loadDumps(inputs, spawn);
  const dynamic = convertDynamicAst(dumps.dynamic, sourceLabel(inputs.dynamicPath));
  if (!dynamic.ok) throw dynamic.error;
  const systems = convertSystemsAst(dumps.systems, sourceLabel(inputs.systemsPath));
  if (!systems.ok) throw systems.error;
  return { dynamic: dynamic.value, systems: systems.value };
}
