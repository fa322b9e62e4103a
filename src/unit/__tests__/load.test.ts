import { describe, expect, it } from "vitest";
import { createMemoryUnitHost } from "../host.js";
import { loadUnitFile, parseUnit, parseUnitText, UnitFormatError } from "../load.js";

const unitJson = {
  root: "main",
  modules: [
    {
      key: "main",
      file: "src/main.ms",
      mods: [{ name: "geo", module: "geo", span: [0, 8] }],
      uses: [{ path: "geo::Point", pub: true, span: [9, 24] }],
    },
    {
      key: "geo",
      file: "src/geo.ms",
      items: [
        { name: "Point", kind: "struct", pub: true, span: [0, 12] },
        { name: "origin", kind: "function", span: [13, 30] },
      ],
      references: [{ path: "Point", span: [20, 25], kinds: ["struct"] }],
    },
  ],
};

const locationOf = (run: () => unknown): string => {
  try {
    run();
  } catch (error) {
    if (error instanceof UnitFormatError) return error.location;
    throw error;
  }
  throw new Error("expected a UnitFormatError");
};

describe("loadUnitFile", () => {
  it("reads a unit and resolves module files beside it", async () => {
    const host = createMemoryUnitHost({
      files: { "project/modscope.json": JSON.stringify(unitJson) },
    });

    const unit = await loadUnitFile("project/modscope.json", host);

    expect(unit.root).toBe("main");
    expect(unit.modules.map((module) => module.file)).toEqual([
      "/project/src/main.ms",
      "/project/src/geo.ms",
    ]);
    expect(unit.modules[0]?.uses).toEqual([
      {
        path: "geo::Point",
        visibility: "pub",
        span: { file: "/project/src/main.ms", start: 9, end: 24 },
      },
    ]);
    expect(unit.modules[1]?.items.map((item) => item.visibility)).toEqual(["pub", "private"]);
    expect(unit.modules[1]?.references).toEqual([
      {
        path: "Point",
        span: { file: "/project/src/geo.ms", start: 20, end: 25 },
        kinds: ["struct"],
      },
    ]);
    expect(unit.modules[1]?.mods).toEqual([]);
  });

  it("rejects a missing unit file", async () => {
    const host = createMemoryUnitHost({ files: {} });
    await expect(loadUnitFile("absent.json", host)).rejects.toThrow(
      "unit file not found: /absent.json",
    );
  });

  it("names the unit file in format errors", async () => {
    const host = createMemoryUnitHost({ files: { "unit.json": "{ nope" } });
    const error = await loadUnitFile("unit.json", host).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UnitFormatError);
    expect(error instanceof UnitFormatError && error.file).toBe("/unit.json");
    expect(error instanceof UnitFormatError && error.location).toBe("$");
  });
});

describe("parseUnit", () => {
  it("points at the offending field", () => {
    expect(locationOf(() => parseUnit([]))).toBe("$");
    expect(locationOf(() => parseUnit({ modules: [] }))).toBe("root");
    expect(locationOf(() => parseUnit({ root: "main", modules: {} }))).toBe("modules");
    expect(
      locationOf(() =>
        parseUnit({
          root: "main",
          modules: [{ key: "main", file: "m.ms", items: [{ name: "A", kind: "class", span: [0, 1] }] }],
        }),
      ),
    ).toBe("modules[0].items[0].kind");
    expect(
      locationOf(() =>
        parseUnit({
          root: "main",
          modules: [{ key: "main", file: "m.ms", uses: [{ path: "a::B", span: [4, 2] }] }],
        }),
      ),
    ).toBe("modules[0].uses[0].span");
    expect(
      locationOf(() =>
        parseUnit({
          root: "main",
          modules: [
            { key: "main", file: "m.ms", references: [{ path: "A", span: [0, 1], kinds: ["enum", 3] }] },
          ],
        }),
      ),
    ).toBe("modules[0].references[0].kinds[1]");
    expect(
      locationOf(() =>
        parseUnit({
          root: "main",
          modules: [{ key: "main", file: "m.ms", items: [{ name: "A", kind: "enum", pub: "yes", span: [0, 1] }] }],
        }),
      ),
    ).toBe("modules[0].items[0].pub");
  });

  it("rejects duplicate module keys", () => {
    expect(() =>
      parseUnit(
        {
          root: "main",
          modules: [
            { key: "main", file: "a.ms" },
            { key: "main", file: "b.ms" },
          ],
        },
        { file: "unit.json" },
      ),
    ).toThrow('unit.json: modules[1].key: duplicate module key "main"');
  });

  it("spells out the allowed item kinds", () => {
    expect(() =>
      parseUnit({
        root: "main",
        modules: [{ key: "main", file: "m.ms", items: [{ name: "A", span: [0, 1] }] }],
      }),
    ).toThrow(
      "modules[0].items[0].kind: expected one of struct, enum, function, type-alias, trait, const",
    );
  });

  it("keeps module files as written without a resolver", () => {
    const unit = parseUnitText(JSON.stringify({ root: "main", modules: [{ key: "main", file: "m.ms" }] }));
    expect(unit.modules).toEqual([
      { key: "main", file: "m.ms", mods: [], items: [], uses: [], references: [] },
    ]);
  });
});
