import { describe, expect, it } from "vitest";
import {
  formatQualifiedPath,
  isBarePath,
  isIdentifier,
  parseQualifiedPath,
  parseUsePaths,
  type NormalizedUseEntry,
  type PathParseResult,
} from "../use-path.js";

const entriesOf = (text: string): NormalizedUseEntry[] => {
  const parsed = parseUsePaths(text);
  if (!parsed.ok) {
    throw new Error(`expected ${text} to parse: ${parsed.reason}`);
  }
  return parsed.value;
};

const reasonFor = (
  text: string,
  parse: (text: string) => PathParseResult<unknown> = parseUsePaths,
): string | undefined => {
  const parsed = parse(text);
  return parsed.ok ? undefined : parsed.reason;
};

describe("parseUsePaths", () => {
  it("parses a single import", () => {
    expect(entriesOf("another_lib::VeryCommonNameStruct")).toEqual([
      {
        anchor: { kind: "implicit" },
        segments: ["another_lib"],
        name: "VeryCommonNameStruct",
        alias: "VeryCommonNameStruct",
        text: "another_lib::VeryCommonNameStruct",
      },
    ]);
  });

  it("expands groups and aliases into one entry per bound name", () => {
    const entries = entriesOf("shapes::{Circle, Square as Box,}");
    expect(entries.map((entry) => [entry.text, entry.alias])).toEqual([
      ["shapes::Circle", "Circle"],
      ["shapes::Square", "Box"],
    ]);
  });

  it("supports nested groups", () => {
    const entries = entriesOf("geo::{shapes::{Circle}, Point}");
    expect(entries.map((entry) => entry.text)).toEqual(["geo::shapes::Circle", "geo::Point"]);
  });

  it("reads crate, self and super anchors", () => {
    expect(entriesOf("crate::a::X")[0]?.anchor).toEqual({ kind: "crate" });
    expect(entriesOf("::a::X")[0]?.text).toBe("crate::a::X");
    expect(entriesOf("self::X")[0]?.anchor).toEqual({ kind: "self" });
    expect(entriesOf("super::super::a::X")[0]).toMatchObject({
      anchor: { kind: "super", hops: 2 },
      segments: ["a"],
      text: "super::super::a::X",
    });
  });

  it("rejects imports without a module path", () => {
    expect(reasonFor("Foo")).toBe("import of Foo needs a module path");
  });

  it("rejects glob imports", () => {
    expect(reasonFor("shapes::*")).toBe('unexpected character "*"');
  });

  it("reports malformed groups", () => {
    expect(reasonFor("shapes::{}")).toBe("empty import group");
    expect(reasonFor("shapes::{Circle,")).toBe("unclosed import group");
    expect(reasonFor("shapes::{Circle Square}")).toBe("expected , or } in import group");
  });

  it("reports misplaced keywords", () => {
    expect(reasonFor("crate")).toBe("crate must be followed by ::");
    expect(reasonFor("shapes::self::X")).toBe("self is not a valid name here");
    expect(reasonFor("shapes::X as")).toBe("expected a name");
  });
});

describe("parseQualifiedPath", () => {
  it("treats a single identifier as a bare path", () => {
    const parsed = parseQualifiedPath("Point");
    expect(parsed.ok && isBarePath(parsed.value)).toBe(true);
  });

  it("does not treat anchored names as bare", () => {
    const parsed = parseQualifiedPath("super::Point");
    expect(parsed.ok && isBarePath(parsed.value)).toBe(false);
  });

  it("splits module segments from the terminal name", () => {
    expect(parseQualifiedPath("crate::geo::shapes::Circle")).toEqual({
      ok: true,
      value: {
        anchor: { kind: "crate" },
        segments: ["geo", "shapes"],
        name: "Circle",
        text: "crate::geo::shapes::Circle",
      },
    });
  });

  it("reports malformed paths", () => {
    expect(reasonFor("", parseQualifiedPath)).toBe("empty path");
    expect(reasonFor("a::b::", parseQualifiedPath)).toBe("expected a name");
    expect(reasonFor("a b", parseQualifiedPath)).toBe("unexpected trailing input");
    expect(reasonFor("super", parseQualifiedPath)).toBe("super must be followed by ::");
    expect(reasonFor("a-b", parseQualifiedPath)).toBe('unexpected character "-"');
  });
});

describe("path helpers", () => {
  it("formats anchored paths", () => {
    expect(
      formatQualifiedPath({ anchor: { kind: "super", hops: 1 }, segments: ["a"], name: "X" }),
    ).toBe("super::a::X");
  });

  it("excludes keywords and the underscore from identifiers", () => {
    expect(isIdentifier("snake_case1")).toBe(true);
    expect(isIdentifier("self")).toBe(false);
    expect(isIdentifier("_")).toBe(false);
    expect(isIdentifier("1abc")).toBe(false);
  });
});
