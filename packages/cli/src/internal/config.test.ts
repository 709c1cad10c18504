import { expect } from "chai";
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { findConfigRoot, loadConfigContext, parseSeamConfig } from "./config.js";

function parseError(value: unknown): string {
  try {
    parseSeamConfig(value);
  } catch (e: unknown) {
    return e instanceof Error ? e.message : String(e);
  }
  return "";
}

describe("@seam/cli config", () => {
  it("findConfigRoot picks the nearest seam.json", () => {
    const root = mkdtempSync(join(tmpdir(), "seam-config-root-"));
    const nested = join(root, "pkg");
    const deep = join(nested, "src", "deep");
    mkdirSync(deep, { recursive: true });
    writeFileSync(join(root, "seam.json"), "{}\n", "utf-8");
    writeFileSync(join(nested, "seam.json"), "{}\n", "utf-8");

    expect(findConfigRoot(deep)).to.equal(nested);
  });

  it("does not stop at a directory without seam.json", () => {
    const root = mkdtempSync(join(tmpdir(), "seam-config-none-"));
    expect(findConfigRoot(root)).to.not.equal(root);
  });

  it("loads a strict config", () => {
    const root = mkdtempSync(join(tmpdir(), "seam-config-load-"));
    writeFileSync(
      join(root, "seam.json"),
      JSON.stringify({ schema: 1, dynamic: "app.py", systems: "list.c", breakpoints: ["boundary"] }),
      "utf-8"
    );
    const context = loadConfigContext(root);
    expect(context?.root).to.equal(root);
    expect(context?.config).to.deep.equal({
      schema: 1,
      dynamic: "app.py",
      systems: "list.c",
      breakpoints: ["boundary"],
    });
  });

  it("rejects unknown keys and bad values", () => {
    expect(parseError({ schema: 1, extra: true })).to.equal("seam.json: unknown key 'extra'.");
    expect(parseError({ schema: 2 })).to.equal("Unsupported seam.json schema.");
    expect(parseError([])).to.equal("seam.json must be a JSON object.");
    expect(parseError({ schema: 1, out: "" })).to.equal("seam.json: 'out' must be a non-empty string.");
    expect(parseError({ schema: 1, fallbackReceiver: "my list" })).to.equal(
      "seam.json: 'fallbackReceiver' must be an identifier."
    );
    expect(parseError({ schema: 1, breakpoints: ["boundary", 3] })).to.equal(
      "seam.json: 'breakpoints' must be an array of non-empty strings."
    );
  });

  it("reports invalid JSON with the file path", () => {
    const root = mkdtempSync(join(tmpdir(), "seam-config-json-"));
    writeFileSync(join(root, "seam.json"), "{ schema: 1 }", "utf-8");
    expect(() => loadConfigContext(root)).to.throw(`${join(root, "seam.json")}: invalid JSON`);
  });
});
