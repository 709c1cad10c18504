import { expect } from "chai";

import type { Phase } from "./phases.js";
import { PHASES, nextPhase, parsePhaseName, phaseDisplayName, phaseIndex } from "./phases.js";

describe("@seam/debugger phases", () => {
  it("advances one phase at a time and stays at Complete", () => {
    const visited: Phase[] = [PHASES[0]];
    let phase = nextPhase(PHASES[0]);
    while (phase !== "Complete") {
      visited.push(phase);
      phase = nextPhase(phase);
    }
    expect([...visited, phase]).to.deep.equal([...PHASES]);
    expect(nextPhase("Complete")).to.equal("Complete");
    expect(phaseIndex("UnifiedHIR")).to.equal(5);
  });

  it("parses ids and display names loosely", () => {
    expect(parsePhaseName("UnifiedHIR")).to.equal("UnifiedHIR");
    expect(parsePhaseName("unified hir")).to.equal("UnifiedHIR");
    expect(parsePhaseName("dynamic-parsed")).to.equal("DynamicParsed");
    expect(parsePhaseName("OPTIMIZED")).to.equal("Optimized");
    expect(parsePhaseName("linked")).to.equal(undefined);
    expect(phaseDisplayName("SystemsHIR")).to.equal("Systems HIR");
  });
});
