import { expect } from "chai";

import { CompileError, InternalError } from "../diagnostics.js";
import {
  circuitTarget,
  fieldOf,
  instOf,
  moduleTarget,
  parseTarget,
  refOf,
  serializeTarget,
} from "../ir/targets.js";
import { RenameLedger } from "./ledger.js";

describe("@circuit-renamer/compiler rename ledger", () => {
  const foo = moduleTarget("Foo", "Foo");

  it("answers singleton queries only for unambiguous entries", () => {
    const ledger = new RenameLedger();
    ledger.register(refOf(foo, "a"), refOf(foo, "b"));
    ledger.register(refOf(foo, "x"), refOf(foo, "y"));
    ledger.register(refOf(foo, "x"), refOf(foo, "z"));
    ledger.register(refOf(foo, "x"), refOf(foo, "z"));

    expect(ledger.resolve(refOf(foo, "a"))).to.deep.equal(refOf(foo, "b"));
    expect(ledger.get(refOf(foo, "x"))).to.have.length(2);
    expect(ledger.resolve(refOf(foo, "x"))).to.equal(undefined);
    expect(ledger.resolve(refOf(foo, "missing"))).to.equal(undefined);
    expect(ledger.size).to.equal(2);
    expect(ledger.entries().map((e) => serializeTarget(e.from))).to.deep.equal(["~Foo|Foo>a", "~Foo|Foo>x"]);
  });

  it("composes later renames through earlier ones", () => {
    const first = new RenameLedger();
    first.register(refOf(foo, "a"), refOf(foo, "b"));

    const second = new RenameLedger();
    second.register(refOf(foo, "b"), refOf(foo, "c"));
    second.register(refOf(foo, "q"), refOf(foo, "r"));

    first.compose(second);
    expect(first.resolve(refOf(foo, "a"))).to.deep.equal(refOf(foo, "c"));
    expect(first.resolve(refOf(foo, "b"))).to.deep.equal(refOf(foo, "c"));
    expect(first.resolve(refOf(foo, "q"))).to.deep.equal(refOf(foo, "r"));
  });

  it("composes through renames of an instance's module", () => {
    const first = new RenameLedger();
    first.register(moduleTarget("Foo", "Child"), moduleTarget("Foo", "child"));
    first.register(instOf(foo, "u", "Child"), instOf(foo, "u0", "Child"));

    // keyed by the names the first ledger produced
    const second = new RenameLedger();
    second.register(instOf(foo, "u0", "child"), instOf(foo, "u1", "child"));

    first.compose(second);
    expect(first.resolve(instOf(foo, "u", "Child"))).to.deep.equal(instOf(foo, "u1", "Child"));
    expect(serializeTarget(first.track(instOf(foo, "u", "Child")))).to.equal("~Foo|Foo/u1:child");
    expect(first.resolve(instOf(foo, "u0", "child"))).to.deep.equal(instOf(foo, "u1", "child"));
  });

  it("tracks a target through renames of its enclosing components", () => {
    const ledger = new RenameLedger();
    ledger.register(circuitTarget("Foo"), circuitTarget("foo"));
    ledger.register(foo, moduleTarget("Foo", "foo"));
    ledger.register(refOf(foo, "MeM"), refOf(foo, "mem"));
    ledger.register(fieldOf(refOf(foo, "MeM"), "wRITE"), fieldOf(refOf(foo, "MeM"), "write"));
    ledger.register(moduleTarget("Foo", "Bar"), moduleTarget("Foo", "bar"));
    ledger.register(instOf(foo, "SuB", "Bar"), instOf(foo, "sub", "Bar"));

    expect(serializeTarget(ledger.track(parseTarget("~Foo|Foo>MeM.wRITE.en")))).to.equal("~foo|foo>mem.write.en");
    expect(serializeTarget(ledger.track(parseTarget("~Foo|Foo/SuB:Bar")))).to.equal("~foo|foo/sub:bar");
    expect(serializeTarget(ledger.track(parseTarget("~Foo|Foo/SuB:Bar>x")))).to.equal("~foo|foo/sub:bar>x");
    expect(serializeTarget(ledger.track(parseTarget("~Foo|Baz>y")))).to.equal("~foo|Baz>y");
  });

  it("rejects a replacement of a different kind while tracking", () => {
    const ledger = new RenameLedger();
    ledger.register(moduleTarget("Foo", "Bar"), circuitTarget("Bar"));
    expect(() => ledger.track(refOf(moduleTarget("Foo", "Bar"), "a")))
      .to.throw(InternalError)
      .with.property("code", "CRN2006");
  });

  it("round-trips through its JSON form", () => {
    const ledger = new RenameLedger();
    ledger.register(circuitTarget("Foo"), circuitTarget("pfx_Foo"));
    ledger.register(refOf(foo, "a"), refOf(foo, "pfx_a"));

    const json = ledger.toJSON();
    expect(json).to.deep.equal({
      "~Foo": ["~pfx_Foo"],
      "~Foo|Foo>a": ["~Foo|Foo>pfx_a"],
    });
    expect(RenameLedger.fromJSON(json).toJSON()).to.deep.equal(json);
  });

  it("rejects malformed ledger JSON", () => {
    expect(() => RenameLedger.fromJSON([])).to.throw(CompileError).with.property("code", "CRN3002");
    expect(() => RenameLedger.fromJSON({ "~Foo": "~Bar" }))
      .to.throw(CompileError)
      .with.property("code", "CRN3002");
  });
});
