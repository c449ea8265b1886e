import { expect } from "chai";

import { InternalError } from "../diagnostics.js";
import type { Circuit, Decl, Expr, Module } from "../ir/circuit.js";
import { clockType, ref, subfield, uintLit, uintType } from "../ir/circuit.js";
import { circuitTarget, instOf, moduleTarget, parseTarget, refOf, serializeTarget } from "../ir/targets.js";
import { writeCircuit } from "../ir/write.js";
import { RenameLedger } from "./ledger.js";
import { createRenamePass, manipulateNames, type ManipulateRule } from "./manipulate-names.js";
import { addPrefix, lowerCaseNames, removeKeywordCollisions, upperCaseNames } from "./rules.js";
import { createSkipSet } from "./skips.js";

function fooWithTwoBars(): Circuit {
  return {
    main: "Foo",
    modules: [
      {
        kind: "module",
        name: "Foo",
        ports: [],
        body: [
          { kind: "inst", name: "bar", module: "Bar" },
          { kind: "inst", name: "bar2", module: "Bar" },
        ],
      },
      { kind: "module", name: "Bar", ports: [], body: [] },
    ],
  };
}

function declarations(module: Module | undefined): string[] {
  if (module === undefined || module.kind !== "module") return [];
  return module.body.flatMap((s) => (s.kind === "wire" ? [s.name] : []));
}

function instances(module: Module | undefined): string[] {
  if (module === undefined || module.kind !== "module") return [];
  return module.body.flatMap((s) => (s.kind === "inst" ? [`${s.name} of ${s.module}`] : []));
}

describe("@circuit-renamer/compiler manipulateNames", () => {
  const prefix = addPrefix("pfx_");

  it("renames the circuit and its only module", () => {
    const out = manipulateNames({ main: "Foo", modules: [{ kind: "module", name: "Foo", ports: [], body: [] }] }, prefix);
    expect(out.main).to.equal("pfx_Foo");
    expect(out.modules.map((m) => m.name)).to.deep.equal(["pfx_Foo"]);
  });

  it("renames instances apart and points them at the renamed module", () => {
    const ledger = new RenameLedger();
    const out = manipulateNames(fooWithTwoBars(), prefix, { ledger });
    expect(out.main).to.equal("pfx_Foo");
    expect(out.modules.map((m) => m.name)).to.deep.equal(["pfx_Foo", "pfx_Bar"]);
    expect(instances(out.modules[0])).to.deep.equal(["pfx_bar of pfx_Bar", "pfx_bar2 of pfx_Bar"]);
    expect(ledger.toJSON()).to.deep.equal({
      "~Foo": ["~pfx_Foo"],
      "~Foo|Bar": ["~Foo|pfx_Bar"],
      "~Foo|Foo": ["~Foo|pfx_Foo"],
      "~Foo|Foo/bar:Bar": ["~Foo|Foo/pfx_bar:Bar"],
      "~Foo|Foo/bar2:Bar": ["~Foo|Foo/pfx_bar2:Bar"],
    });
  });

  it("leaves the whole circuit alone when the circuit is skipped", () => {
    const circuit = fooWithTwoBars();
    const ledger = new RenameLedger();
    const out = manipulateNames(circuit, prefix, { ledger, skips: createSkipSet([circuitTarget("Foo")]) });
    expect(out).to.equal(circuit);
    expect(ledger.size).to.equal(0);
  });

  it("keeps a skipped module name while renaming everything else", () => {
    const out = manipulateNames(fooWithTwoBars(), prefix, {
      skips: createSkipSet([moduleTarget("Foo", "Foo")]),
    });
    expect(out.main).to.equal("pfx_Foo");
    expect(out.modules.map((m) => m.name)).to.deep.equal(["Foo", "pfx_Bar"]);
    expect(instances(out.modules[0])).to.deep.equal(["pfx_bar of pfx_Bar", "pfx_bar2 of pfx_Bar"]);
  });

  it("keeps a skipped instance name but still follows its module's rename", () => {
    const foo = moduleTarget("Foo", "Foo");
    const out = manipulateNames(fooWithTwoBars(), prefix, {
      skips: createSkipSet([instOf(foo, "bar", "Bar")]),
    });
    expect(instances(out.modules[0])).to.deep.equal(["bar of pfx_Bar", "pfx_bar2 of pfx_Bar"]);
    expect(out.modules[1]?.name).to.equal("pfx_Bar");
  });

  it("returns an equal circuit and records nothing when the rule keeps every name", () => {
    const ledger = new RenameLedger();
    const circuit = fooWithTwoBars();
    const out = manipulateNames(circuit, () => undefined, { ledger });
    expect(out).to.deep.equal(circuit);
    expect(ledger.size).to.equal(0);
  });

  it("rewrites instance ports and memory ports through their declarations", () => {
    const circuit: Circuit = {
      main: "Top",
      modules: [
        {
          kind: "module",
          name: "Top",
          ports: [
            { name: "clock", direction: "input", type: clockType() },
            { name: "out", direction: "output", type: uintType(8) },
          ],
          body: [
            { kind: "inst", name: "c", module: "Child" },
            { kind: "inst", name: "e", module: "reg" },
            {
              kind: "mem",
              name: "reg",
              dataType: uintType(8),
              depth: 4,
              readLatency: 0,
              writeLatency: 1,
              readers: ["wire"],
              writers: ["w"],
              readwriters: [],
              readUnderWrite: "undefined",
            },
            { kind: "connect", loc: subfield(ref("c"), "a"), expr: subfield(subfield(ref("reg"), "wire"), "data") },
            { kind: "connect", loc: subfield(subfield(ref("reg"), "wire"), "clk"), expr: ref("clock") },
            { kind: "connect", loc: ref("out"), expr: subfield(ref("c"), "wire") },
            { kind: "connect", loc: subfield(ref("e"), "wire"), expr: subfield(ref("c"), "wire") },
          ],
        },
        {
          kind: "module",
          name: "Child",
          ports: [
            { name: "a", direction: "input", type: uintType(8) },
            { name: "wire", direction: "output", type: uintType(8) },
          ],
          body: [{ kind: "connect", loc: ref("wire"), expr: ref("a") }],
        },
        {
          kind: "extmodule",
          name: "reg",
          ports: [{ name: "wire", direction: "input", type: uintType(1) }],
          defname: "reg",
          params: [],
        },
      ],
    };

    const ledger = new RenameLedger();
    const out = manipulateNames(circuit, removeKeywordCollisions(new Set(["wire", "reg", "data"])), { ledger });

    expect(writeCircuit(out)).to.equal(
      [
        "circuit Top :",
        "  module Top :",
        "    input clock : Clock",
        "    output out : UInt<8>",
        "",
        "    inst c of Child",
        "    inst e of reg_",
        "    mem reg_ :",
        "      data-type => UInt<8>",
        "      depth => 4",
        "      read-latency => 0",
        "      write-latency => 1",
        "      reader => wire_",
        "      writer => w",
        "      read-under-write => undefined",
        "    c.a <= reg_.wire_.data",
        "    reg_.wire_.clk <= clock",
        "    out <= c.wire_",
        "    e.wire <= c.wire_",
        "",
        "  module Child :",
        "    input a : UInt<8>",
        "    output wire_ : UInt<8>",
        "",
        "    wire_ <= a",
        "",
        "  extmodule reg_ :",
        "    input wire : UInt<1>",
        "    defname = reg",
        "",
      ].join("\n")
    );
    expect(ledger.toJSON()).to.deep.equal({
      "~Top|Child>wire": ["~Top|Child>wire_"],
      "~Top|reg": ["~Top|reg_"],
      "~Top|Top>reg": ["~Top|Top>reg_"],
      "~Top|Top>reg.wire": ["~Top|Top>reg.wire_"],
    });
  });

  it("renames a bare reference to an instance", () => {
    const circuit: Circuit = {
      main: "Foo",
      modules: [
        {
          kind: "module",
          name: "Foo",
          ports: [],
          body: [
            { kind: "inst", name: "bar", module: "Bar" },
            { kind: "invalidate", expr: ref("bar") },
          ],
        },
        { kind: "module", name: "Bar", ports: [], body: [] },
      ],
    };
    const out = manipulateNames(circuit, prefix);
    const top = out.modules[0];
    expect(top?.kind === "module" ? top.body[1] : undefined).to.deep.equal({
      kind: "invalidate",
      expr: ref("pfx_bar"),
    });
  });

  it("composes successive runs into the caller's ledger", () => {
    const circuit: Circuit = {
      main: "Foo",
      modules: [{ kind: "module", name: "Foo", ports: [], body: [{ kind: "wire", name: "x", type: uintType(1) }] }],
    };
    const ledger = new RenameLedger();
    const once = manipulateNames(circuit, removeKeywordCollisions(new Set(["x"])), { ledger });
    manipulateNames(once, removeKeywordCollisions(new Set(["x_"])), { ledger });

    const foo = moduleTarget("Foo", "Foo");
    expect(ledger.resolve(refOf(foo, "x"))).to.deep.equal(refOf(foo, "x__"));
    expect(ledger.resolve(refOf(foo, "x_"))).to.deep.equal(refOf(foo, "x__"));
  });

  it("chases later runs through renames of the enclosing circuit and module", () => {
    const circuit: Circuit = {
      main: "Foo",
      modules: [{ kind: "module", name: "Foo", ports: [], body: [{ kind: "wire", name: "x", type: uintType(1) }] }],
    };
    const ledger = new RenameLedger();
    const once = manipulateNames(circuit, addPrefix("p_"), { ledger });
    const twice = manipulateNames(once, addPrefix("p_"), { ledger });

    const foo = moduleTarget("Foo", "Foo");
    expect(twice.main).to.equal("p_p_Foo");
    expect(ledger.resolve(refOf(foo, "x"))).to.deep.equal(refOf(foo, "p_p_x"));
    expect(serializeTarget(ledger.track(refOf(foo, "x")))).to.equal("~p_p_Foo|p_p_Foo>p_p_x");
    expect(serializeTarget(ledger.track(circuitTarget("Foo")))).to.equal("~p_p_Foo");
    expect(ledger.toJSON()).to.deep.equal({
      "~Foo": ["~p_p_Foo"],
      "~Foo|Foo": ["~Foo|p_p_Foo"],
      "~Foo|Foo>x": ["~Foo|Foo>p_p_x"],
      "~p_Foo": ["~p_p_Foo"],
      "~p_Foo|p_Foo": ["~p_Foo|p_p_Foo"],
      "~p_Foo|p_Foo>p_x": ["~p_Foo|p_Foo>p_p_x"],
    });
  });

  it("allocates module names in one scope shared by every module", () => {
    const circuit: Circuit = {
      main: "Top",
      modules: [
        {
          kind: "module",
          name: "Top",
          ports: [],
          body: [
            { kind: "inst", name: "a", module: "Bar" },
            { kind: "inst", name: "b", module: "bar" },
          ],
        },
        { kind: "module", name: "Bar", ports: [], body: [] },
        { kind: "module", name: "bar", ports: [], body: [] },
      ],
    };
    const out = manipulateNames(circuit, lowerCaseNames);
    expect(out.main).to.equal("top");
    expect(out.modules.map((m) => m.name)).to.deep.equal(["top", "bar_0", "bar"]);
    expect(instances(out.modules[0])).to.deep.equal(["a of bar_0", "b of bar"]);
  });

  it("keeps the top module on the circuit name when a local declaration already holds it", () => {
    const circuit: Circuit = {
      main: "Foo",
      modules: [{ kind: "module", name: "Foo", ports: [], body: [{ kind: "wire", name: "p_Foo", type: uintType(1) }] }],
    };
    const out = manipulateNames(circuit, addPrefix("p_"));
    expect(out.main).to.equal("p_Foo");
    expect(out.modules.map((m) => m.name)).to.deep.equal(["p_Foo"]);
    expect(declarations(out.modules[0])).to.deep.equal(["p_p_Foo"]);
  });

  it("reserves every name a rule hands back", () => {
    const stripUnderscores: ManipulateRule = (name, namespace) => {
      const base = name.replace(/_+$/, "");
      return base !== name && !namespace.contains(base) ? base : undefined;
    };
    const circuit: Circuit = {
      main: "Foo",
      modules: [
        {
          kind: "module",
          name: "Foo",
          ports: [],
          body: [
            { kind: "wire", name: "x_", type: uintType(1) },
            { kind: "wire", name: "x__", type: uintType(1) },
          ],
        },
      ],
    };
    const out = manipulateNames(circuit, stripUnderscores);
    expect(declarations(out.modules[0])).to.deep.equal(["x", "x__"]);
  });

  it("renames readwriters, nested declarations and external module names under a case rule", () => {
    const mem: Decl = {
      kind: "mem",
      name: "m",
      dataType: uintType(8),
      depth: 2,
      readLatency: 0,
      writeLatency: 1,
      readers: ["r"],
      writers: [],
      readwriters: ["rw"],
      readUnderWrite: "undefined",
    };
    const circuit: Circuit = {
      main: "top",
      modules: [
        {
          kind: "module",
          name: "top",
          ports: [{ name: "clk", direction: "input", type: clockType() }],
          body: [
            mem,
            { kind: "inst", name: "e", module: "ext" },
            {
              kind: "when",
              cond: subfield(subfield(ref("m"), "rw"), "wmode"),
              then: [
                { kind: "wire", name: "t", type: uintType(1) },
                { kind: "connect", loc: ref("t"), expr: subfield(ref("e"), "o") },
              ],
              else: [
                { kind: "block", stmts: [{ kind: "node", name: "k", value: subfield(subfield(ref("m"), "r"), "data") }] },
              ],
            },
            { kind: "connect", loc: subfield(subfield(ref("m"), "r"), "addr"), expr: ref("t") },
            { kind: "connect", loc: subfield(subfield(ref("m"), "rw"), "en"), expr: ref("k") },
            { kind: "connect", loc: subfield(ref("e"), "i"), expr: ref("clk") },
          ],
        },
        {
          kind: "extmodule",
          name: "ext",
          ports: [
            { name: "i", direction: "input", type: uintType(1) },
            { name: "o", direction: "output", type: uintType(1) },
          ],
          defname: "ext_impl",
          params: [],
        },
      ],
    };

    const ledger = new RenameLedger();
    const out = manipulateNames(circuit, upperCaseNames, {
      ledger,
      skips: createSkipSet([parseTarget("~top|top>m.r")]),
    });

    expect(writeCircuit(out)).to.equal(
      [
        "circuit TOP :",
        "  module TOP :",
        "    input CLK : Clock",
        "",
        "    mem M :",
        "      data-type => UInt<8>",
        "      depth => 2",
        "      read-latency => 0",
        "      write-latency => 1",
        "      reader => r",
        "      readwriter => RW",
        "      read-under-write => undefined",
        "    inst E of EXT",
        "    when M.RW.wmode :",
        "      wire T : UInt<1>",
        "      T <= E.o",
        "    else :",
        "      node K = M.r.data",
        "    M.r.addr <= T",
        "    M.RW.en <= K",
        "    E.i <= CLK",
        "",
        "  extmodule EXT :",
        "    input i : UInt<1>",
        "    output o : UInt<1>",
        "    defname = ext_impl",
        "",
      ].join("\n")
    );
    expect(ledger.get(parseTarget("~top|top>m.r"))).to.equal(undefined);
    expect(ledger.resolve(parseTarget("~top|top>m.rw"))).to.deep.equal(parseTarget("~top|top>m.RW"));
  });

  it("aborts on a subfield of something that is neither an instance nor a memory", () => {
    const circuit: Circuit = {
      main: "Foo",
      modules: [
        {
          kind: "module",
          name: "Foo",
          ports: [],
          body: [
            { kind: "wire", name: "w", type: uintType(1) },
            { kind: "node", name: "n", value: subfield(ref("w"), "x") },
          ],
        },
      ],
    };
    const ledger = new RenameLedger();
    ledger.register(parseTarget("~Foo|Foo>old"), parseTarget("~Foo|Foo>new"));
    const before = ledger.toJSON();

    expect(() => manipulateNames(circuit, prefix, { ledger }))
      .to.throw(InternalError, "~Foo|Foo>w")
      .with.property("code", "CRN2001");
    expect(ledger.toJSON()).to.deep.equal(before);
  });

  it("rejects subfields below an instance port, deep nesting and non-reference bases", () => {
    const withBody = (value: Expr): Circuit => ({
      main: "Foo",
      modules: [
        {
          kind: "module",
          name: "Foo",
          ports: [],
          body: [
            { kind: "inst", name: "c", module: "Bar" },
            {
              kind: "mem",
              name: "m",
              dataType: uintType(8),
              depth: 2,
              readLatency: 0,
              writeLatency: 1,
              readers: ["r"],
              writers: [],
              readwriters: [],
              readUnderWrite: "undefined",
            },
            { kind: "node", name: "n", value },
          ],
        },
        { kind: "module", name: "Bar", ports: [], body: [] },
      ],
    });
    const keep = () => undefined;

    expect(() => manipulateNames(withBody(subfield(subfield(ref("c"), "p"), "q")), keep))
      .to.throw(InternalError, "reaches below an instance port")
      .with.property("code", "CRN2002");
    expect(() => manipulateNames(withBody(subfield(subfield(subfield(ref("m"), "r"), "data"), "x")), keep))
      .to.throw(InternalError, "nesting is too deep")
      .with.property("code", "CRN2002");
    expect(() =>
      manipulateNames(
        withBody(subfield({ kind: "mux", cond: uintLit(1), tval: ref("c"), fval: ref("c") }, "p")),
        keep
      )
    )
      .to.throw(InternalError, "only instance ports and memory ports")
      .with.property("code", "CRN2002");
  });

  it("fails when a custom module order leaves a module out", () => {
    expect(() => manipulateNames(fooWithTwoBars(), prefix, { moduleOrder: (c) => c.modules.slice(1) }))
      .to.throw(InternalError, "left out module 'Foo'")
      .with.property("code", "CRN2008");
  });

  it("wraps a rule as a named pass", () => {
    const pass = createRenamePass("prefix", prefix);
    const ledger = new RenameLedger();
    const out = pass.run(fooWithTwoBars(), ledger, createSkipSet([moduleTarget("Foo", "Bar")]));
    expect(pass.name).to.equal("prefix");
    expect(out.modules.map((m) => m.name)).to.deep.equal(["pfx_Foo", "Bar"]);
    expect(instances(out.modules[0])).to.deep.equal(["pfx_bar of Bar", "pfx_bar2 of Bar"]);
    expect(ledger.resolve(moduleTarget("Foo", "Bar"))).to.equal(undefined);
  });
});
