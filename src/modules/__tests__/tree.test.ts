import { describe, expect, it } from "vitest";
import { buildUnit } from "../../semantics/__tests__/support/unit-builder.js";
import { buildModuleTree } from "../tree.js";

describe("buildModuleTree", () => {
  it("numbers modules breadth-first from the root", () => {
    const tree = buildModuleTree(
      buildUnit("main", {
        main: { mods: ["geo", "util"] },
        geo: { mods: ["shapes"] },
        shapes: {},
        util: {},
      }),
    );

    expect(tree.diagnostics).toEqual([]);
    expect(tree.modules.map((node) => [node.key, node.name, node.parent, node.depth])).toEqual([
      ["main", "crate", undefined, 0],
      ["geo", "geo", 0, 1],
      ["util", "util", 0, 1],
      ["shapes", "shapes", 1, 2],
    ]);
    expect(tree.byKey.get("shapes")).toBe(3);
    expect(Array.from(tree.modules[1]?.children ?? [])).toEqual([["shapes", 3]]);
  });

  it("keeps the first of two sibling modules with the same name", () => {
    const tree = buildModuleTree(
      buildUnit("main", {
        main: { mods: [["a", "x"], ["a", "y"]] },
        x: {},
        y: {},
      }),
    );

    expect(tree.modules.map((node) => node.key)).toEqual(["main", "x"]);
    const [duplicate, unreachable] = tree.diagnostics;
    expect(duplicate).toMatchObject({
      code: "MT0001",
      errorKind: "DuplicateModuleName",
      message: "module a is declared more than once in main",
      span: { file: "main.ms", start: 10, end: 15 },
    });
    expect(duplicate?.related?.[0]).toMatchObject({
      severity: "note",
      message: "module a first declared here",
      span: { file: "main.ms", start: 0, end: 5 },
    });
    expect(unreachable).toMatchObject({
      code: "MT0005",
      severity: "warning",
      message: "module y is not reachable from the root and was skipped",
    });
  });

  it("reports a mod cycle once", () => {
    const tree = buildModuleTree(
      buildUnit("main", {
        main: { mods: ["a"] },
        a: { mods: ["b"] },
        b: { mods: ["a"] },
      }),
    );

    expect(tree.diagnostics).toHaveLength(1);
    expect(tree.diagnostics[0]).toMatchObject({
      code: "MT0002",
      message: "mod declarations form a cycle: a -> b -> a",
      span: { file: "a.ms", start: 0, end: 5 },
    });
    expect(tree.modules.map((node) => node.key)).toEqual(["main", "a", "b"]);
  });

  it("reports a module that declares itself", () => {
    const tree = buildModuleTree(buildUnit("main", { main: { mods: [["me", "main"]] } }));
    expect(tree.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "mod declarations form a cycle: main -> main",
    ]);
    expect(tree.modules).toHaveLength(1);
  });

  it("rejects a second parent for one module", () => {
    const tree = buildModuleTree(
      buildUnit("main", {
        main: { mods: ["a", "b"] },
        a: { mods: [["shared", "s"]] },
        b: { mods: [["again", "s"]] },
        s: {},
      }),
    );

    expect(tree.diagnostics).toHaveLength(1);
    expect(tree.diagnostics[0]).toMatchObject({
      code: "MT0004",
      message: "module s cannot also be a child of b",
      span: { file: "b.ms", start: 0, end: 5 },
    });
    expect(tree.diagnostics[0]?.related?.[0]?.message).toBe("already declared as a child of a");
    expect(tree.modules[3]?.name).toBe("shared");
  });

  it("reports mods that name unknown modules", () => {
    const tree = buildModuleTree(buildUnit("main", { main: { mods: [["gone", "nowhere"]] } }));
    expect(tree.diagnostics).toEqual([
      expect.objectContaining({
        code: "MT0003",
        message: "mod gone refers to unknown module nowhere",
      }),
    ]);
  });

  it("synthesizes an empty root when the root key is missing", () => {
    const tree = buildModuleTree(buildUnit("absent", { a: {} }));

    expect(tree.modules).toHaveLength(1);
    expect(tree.modules[0]?.key).toBe("absent");
    expect(tree.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(["MT0003", "MT0005"]);
    expect(tree.diagnostics[0]?.message).toBe("root module absent is not part of the unit");
  });

  it("rejects path keywords as module names", () => {
    const tree = buildModuleTree(
      buildUnit("main", { main: { mods: [["self", "a"]] }, a: {} }),
    );
    expect(tree.diagnostics[0]).toMatchObject({
      code: "MT0006",
      message: "self is a path keyword and cannot name a module",
    });
  });

  it("rejects module names that are not identifiers", () => {
    const tree = buildModuleTree(
      buildUnit("main", { main: { mods: [["my-lib", "lib"], ["as", "other"]] }, lib: {}, other: {} }),
    );

    expect(tree.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "my-lib is not a valid module name",
      "as is a path keyword and cannot name a module",
      "module lib is not reachable from the root and was skipped",
      "module other is not reachable from the root and was skipped",
    ]);
    expect(tree.diagnostics[0]?.errorKind).toBe("InvalidModuleName");
    expect(tree.modules).toHaveLength(1);
  });

  it("throws on duplicate module keys", () => {
    expect(() =>
      buildModuleTree({
        root: "main",
        modules: [
          { key: "main", file: "a.ms", mods: [], items: [], uses: [], references: [] },
          { key: "main", file: "b.ms", mods: [], items: [], uses: [], references: [] },
        ],
      }),
    ).toThrow("module key main appears more than once in the unit");
  });
});
