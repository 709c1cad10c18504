import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { dynamicDump, systemsDump } from "@seam/debugger/testing";

export function writeJson(path: string, value: unknown): void {
  writeFileSync(path, JSON.stringify(value, null, 2) + "\n", "utf-8");
}

/** A temp project with `app.py.json`, `list.c.json` and, optionally, a `seam.json`. */
export function makeProject(
  prefix: string,
  opts: { readonly callee?: string; readonly config?: Record<string, unknown> } = {}
): { readonly root: string; readonly nested: string } {
  const root = mkdtempSync(join(tmpdir(), `seam-${prefix}-`));
  const nested = join(root, "src", "deep");
  mkdirSync(nested, { recursive: true });
  writeJson(join(root, "app.py.json"), dynamicDump(opts.callee));
  writeJson(join(root, "list.c.json"), systemsDump());
  if (opts.config) writeJson(join(root, "seam.json"), opts.config);
  return { root, nested };
}
