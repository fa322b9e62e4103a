import { describe, expect, it } from "vitest";
import { buildModuleTree } from "../../modules/tree.js";
import { collectDeclarations } from "../declarations.js";
import { getImportScope, resolveImports } from "../imports.js";
import { resolveOptions, type ResolverOptions } from "../options.js";
import { buildUnit, type ModuleSpec } from "./support/unit-builder.js";

const runImports = (
  modules: Record<string, ModuleSpec>,
  options: Partial<ResolverOptions> = {},
) => {
  const tree = buildModuleTree(buildUnit("main", modules));
  const symbols = collectDeclarations(tree);
  const imports = resolveImports({ tree, symbols, options: resolveOptions(options) });
  const scopeOf = (key: string) => getImportScope(imports, tree.byKey.get(key) ?? -1);
  const bound = (key: string, name: string) =>
    scopeOf(key)
      .get(name)
      ?.declarations.map(
        (declaration) => `${tree.modules[declaration.module]?.key}::${declaration.name}`,
      );
  return { tree, symbols, imports, bound };
};

const messages = (diagnostics: readonly { code: string; message: string }[]) =>
  diagnostics.map((diagnostic) => `${diagnostic.code} ${diagnostic.message}`);

describe("resolveImports", () => {
  it("binds grouped and aliased imports", () => {
    const { imports, bound } = runImports({
      main: { mods: ["shapes", "app"] },
      shapes: { items: ["Circle", "Square"] },
      app: { uses: ["shapes::{Circle, Square as Box}"] },
    });

    expect(imports.diagnostics).toEqual([]);
    expect(bound("app", "Circle")).toEqual(["shapes::Circle"]);
    expect(bound("app", "Box")).toEqual(["shapes::Square"]);
    expect(bound("app", "Square")).toBeUndefined();
  });

  it("follows pub use re-exports across passes", () => {
    const { imports, bound } = runImports({
      main: { mods: ["inner", "app", "facade"] },
      inner: { items: ["Gadget"] },
      app: { uses: ["facade::Gadget"] },
      facade: { uses: [{ path: "inner::Gadget", pub: true }] },
    });

    expect(imports.diagnostics).toEqual([]);
    expect(imports.passes).toBe(2);
    expect(bound("app", "Gadget")).toEqual(["inner::Gadget"]);
    expect(bound("facade", "Gadget")).toEqual(["inner::Gadget"]);
  });

  it("does not re-export private imports", () => {
    const { imports, bound } = runImports({
      main: { mods: ["inner", "facade", "app"] },
      inner: { items: ["Gadget"] },
      facade: { uses: ["inner::Gadget"] },
      app: { uses: ["facade::Gadget"] },
    });

    expect(messages(imports.diagnostics)).toEqual(["RS0005 Gadget is private to crate::facade"]);
    expect(imports.diagnostics[0]?.phase).toBe("imports");
    expect(bound("app", "Gadget")).toBeUndefined();
  });

  it("hides private items outside their subtree", () => {
    const { imports, bound } = runImports({
      main: { mods: ["inner", "app"] },
      inner: { mods: ["child"], items: [{ name: "Secret", pub: false }] },
      child: { uses: ["super::Secret"] },
      app: { uses: ["inner::Secret"] },
    });

    expect(messages(imports.diagnostics)).toEqual(["RS0005 Secret is private to crate::inner"]);
    expect(bound("child", "Secret")).toEqual(["inner::Secret"]);
  });

  it("reports missing modules and items", () => {
    const { imports } = runImports({
      main: { mods: ["shapes", "app"] },
      shapes: { items: ["Circle"] },
      app: { uses: ["shapes::Hexagon", "nowhere::Circle"] },
    });

    expect(messages(imports.diagnostics)).toEqual([
      "IM0001 unresolved import nowhere::Circle: no module named nowhere",
      "IM0001 unresolved import shapes::Hexagon: crate::shapes has no item named Hexagon",
    ]);
    expect(imports.diagnostics.map((diagnostic) => diagnostic.errorKind)).toEqual([
      "UnresolvedImport",
      "UnresolvedImport",
    ]);
  });

  it("does not let an import wait on itself", () => {
    const { imports } = runImports({
      main: { mods: ["app", "tool"] },
      app: { uses: ["self::Missing"] },
      tool: { uses: ["tool::Missing"] },
    });

    expect(messages(imports.diagnostics)).toEqual([
      "IM0001 unresolved import self::Missing: crate::app has no item named Missing",
      "IM0001 unresolved import tool::Missing: crate::tool has no item named Missing",
    ]);
    expect(imports.passes).toBe(1);
  });

  it("re-exports only the binding its module keeps", () => {
    const shadowed = runImports({
      main: { mods: ["a", "b", "m", "n"] },
      a: { items: ["X"] },
      b: { items: ["X"] },
      m: { uses: ["crate::a::X", { path: "crate::b::X", pub: true }] },
      n: { uses: ["m::X"] },
    });
    expect(messages(shadowed.imports.diagnostics)).toEqual([
      "RS0005 X is private to crate::m",
      "IM0002 X is imported more than once into crate::m with different targets",
    ]);
    expect(shadowed.bound("m", "X")).toEqual(["a::X"]);
    expect(shadowed.bound("n", "X")).toBeUndefined();

    const exported = runImports({
      main: { mods: ["a", "b", "m", "n"] },
      a: { items: ["X"] },
      b: { items: ["X"] },
      m: { uses: [{ path: "crate::a::X", pub: true }, "crate::b::X"] },
      n: { uses: ["m::X"] },
    });
    expect(messages(exported.imports.diagnostics)).toEqual([
      "IM0002 X is imported more than once into crate::m with different targets",
    ]);
    expect(exported.bound("n", "X")).toEqual(["a::X"]);
  });

  it("fails re-export cycles and the imports waiting on them", () => {
    const { imports } = runImports({
      main: { mods: ["a", "b", "c"] },
      a: { uses: [{ path: "b::X", pub: true }] },
      b: { uses: [{ path: "a::X", pub: true }] },
      c: { uses: ["a::X"] },
    });

    expect(messages(imports.diagnostics)).toEqual([
      "IM0003 import b::X never resolves; imports wait on each other: b::X, a::X",
      "IM0003 import a::X never resolves; imports wait on each other: b::X, a::X",
      "IM0001 unresolved import a::X: re-export b::X did not resolve",
    ]);
    expect(imports.passes).toBe(2);
  });

  it("rejects two imports of one name with different targets", () => {
    const { imports, bound } = runImports({
      main: { mods: ["shapes", "other", "app"] },
      shapes: { items: ["Circle"] },
      other: { items: ["Circle"] },
      app: { uses: ["shapes::Circle", "other::Circle"] },
    });

    expect(imports.diagnostics).toHaveLength(1);
    expect(imports.diagnostics[0]).toMatchObject({
      code: "IM0002",
      errorKind: "DuplicateImport",
      message: "Circle is imported more than once into crate::app with different targets",
      span: { file: "app.ms", start: 10, end: 15 },
      surface: "other::Circle",
    });
    expect(imports.diagnostics[0]?.related?.[0]).toMatchObject({
      message: "Circle first imported here",
      span: { file: "app.ms", start: 0, end: 5 },
    });
    expect(bound("app", "Circle")).toEqual(["shapes::Circle"]);
  });

  it("accepts the same declaration imported twice", () => {
    const { imports, bound } = runImports({
      main: { mods: ["shapes", "app"] },
      shapes: { items: ["Circle"] },
      app: { uses: ["shapes::Circle", "crate::shapes::{Circle}"] },
    });

    expect(imports.diagnostics).toEqual([]);
    expect(bound("app", "Circle")).toEqual(["shapes::Circle"]);
  });

  it("reports an import that collides with a local declaration", () => {
    const { imports, bound } = runImports({
      main: { mods: ["shapes", "app"] },
      shapes: { items: ["Circle"] },
      app: { items: ["Circle"], uses: ["shapes::Circle"] },
    });

    expect(messages(imports.diagnostics)).toEqual([
      "IM0002 import of Circle collides with a declaration in crate::app",
    ]);
    expect(imports.diagnostics[0]?.related?.[0]).toMatchObject({
      message: "Circle declared here",
      span: { file: "app.ms", start: 0, end: 5 },
    });
    expect(bound("app", "Circle")).toBeUndefined();
  });

  it("lets locals shadow imports silently under the allow policy", () => {
    const { imports, bound } = runImports(
      {
        main: { mods: ["shapes", "app"] },
        shapes: { items: ["Circle"] },
        app: { items: ["Circle"], uses: ["shapes::Circle"] },
      },
      { localShadowing: "allow" },
    );

    expect(imports.diagnostics).toEqual([]);
    expect(bound("app", "Circle")).toEqual(["shapes::Circle"]);
  });

  it("binds every kind a name has in the target module", () => {
    const { bound } = runImports({
      main: { mods: ["geo", "app"] },
      geo: { items: ["Point", { name: "Point", kind: "function" }] },
      app: { uses: ["geo::Point"] },
    });

    expect(bound("app", "Point")).toEqual(["geo::Point", "geo::Point"]);
  });

  it("reports malformed use paths as invalid", () => {
    const { imports } = runImports({
      main: { mods: ["shapes"], uses: ["shapes::*"] },
      shapes: { items: ["Circle"] },
    });

    expect(imports.diagnostics[0]).toMatchObject({
      code: "RS0006",
      phase: "imports",
      message: 'invalid path "shapes::*": unexpected character "*"',
    });
  });
});
