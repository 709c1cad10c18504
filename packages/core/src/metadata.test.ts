import { expect } from "chai";

import { EMPTY_METADATA, formatSourceLocation, metadata, sourceLocation, withDebugNote } from "./metadata.js";

describe("@seam/core metadata", () => {
  it("builds frozen metadata with only the fields given", () => {
    const loc = sourceLocation("app.py", 2, 12, "dynamic");
    const meta = metadata({ sourceLocation: loc, patternUsed: "len" });
    expect(meta).to.deep.equal({ debugNotes: [], sourceLocation: loc, patternUsed: "len" });
    expect(Object.isFrozen(meta)).to.equal(true);
    expect(Object.isFrozen(meta.debugNotes)).to.equal(true);
    expect(metadata()).to.deep.equal(EMPTY_METADATA);
    expect(formatSourceLocation(loc)).to.equal("app.py:2:12");
  });

  it("returns copies when adding debug notes", () => {
    const first = withDebugNote(EMPTY_METADATA, "converted");
    const second = withDebugNote(first, "unified");
    expect(first.debugNotes).to.deep.equal(["converted"]);
    expect(second.debugNotes).to.deep.equal(["converted", "unified"]);
    expect(Object.isFrozen(second)).to.equal(true);
    expect(EMPTY_METADATA.debugNotes).to.deep.equal([]);
  });
});
