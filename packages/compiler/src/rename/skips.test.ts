import { expect } from "chai";

import { InvalidAddressError } from "../diagnostics.js";
import { fieldOf, moduleTarget, parseTarget, refOf } from "../ir/targets.js";
import { SkipSet, createSkipSet, parseSkipSet } from "./skips.js";

describe("@circuit-renamer/compiler skip set", () => {
  const foo = moduleTarget("Foo", "Foo");

  it("matches targets structurally", () => {
    const skips = createSkipSet([refOf(foo, "a"), fieldOf(refOf(foo, "mem"), "r")]);
    expect(skips.size).to.equal(2);
    expect(skips.has(parseTarget("~Foo|Foo>a"))).to.equal(true);
    expect(skips.has(parseTarget("~Foo|Foo>mem.r"))).to.equal(true);
    expect(skips.has(parseTarget("~Foo|Foo>mem"))).to.equal(false);
    expect(SkipSet.empty.has(refOf(foo, "a"))).to.equal(false);
  });

  it("parses serialized targets", () => {
    const skips = parseSkipSet(["~Foo", "~Foo|Bar", "~Foo|Foo/bar:Bar"]);
    expect(skips.targets.map((t) => t.kind)).to.deep.equal(["circuit", "module", "instance"]);
  });

  it("rejects targets reached through an instance path", () => {
    expect(() => parseSkipSet(["~Foo|Foo/bar:Bar>a"]))
      .to.throw(InvalidAddressError, "Cannot skip non-local target ~Foo|Foo/bar:Bar>a")
      .with.property("code", "CRN1002");
  });

  it("rejects memory port sub-fields", () => {
    expect(() => parseSkipSet(["~Foo|Foo>mem.r.en"]))
      .to.throw(InvalidAddressError)
      .with.property("code", "CRN1003");
  });

  it("surfaces malformed target text", () => {
    expect(() => parseSkipSet(["Foo"])).to.throw(InvalidAddressError).with.property("code", "CRN1001");
  });
});
