import { describe, expect, it } from "vitest";
import {
  DiagnosticError,
  diagnosticCodes,
  diagnosticFromCode,
  formatDiagnostic,
  getDiagnosticDefinition,
  hasErrors,
  isDiagnosticCode,
  normalizeSpan,
} from "../index.js";

const span = { file: "lib.ms", start: 4, end: 9 };

describe("diagnostic utilities", () => {
  it("formats diagnostics with the inferred phase", () => {
    const diagnostic = diagnosticFromCode({
      code: "RS0002",
      params: { kind: "unknown-declaration", name: "Widget", module: "crate::shapes" },
      span,
    });

    expect(formatDiagnostic(diagnostic)).toBe(
      "lib.ms:4-9 ERROR [resolution] RS0002: crate::shapes has no item named Widget",
    );
  });

  it("stamps the enumerated error kind from the registry", () => {
    const diagnostic = diagnosticFromCode({
      code: "IM0003",
      params: { kind: "cyclic-import", path: "a::X", cycle: ["a::X", "b::X"] },
      span,
    });

    expect(diagnostic.errorKind).toBe("CyclicImport");
    expect(diagnostic.phase).toBe("imports");
    expect(diagnostic.message).toBe(
      "import a::X never resolves; imports wait on each other: a::X, b::X",
    );
  });

  it("closes the cycle when rendering module cycles", () => {
    const diagnostic = diagnosticFromCode({
      code: "MT0002",
      params: { kind: "cyclic-module-graph", cycle: ["a", "b"] },
      span,
    });
    expect(diagnostic.message).toBe("mod declarations form a cycle: a -> b -> a");
  });

  it("carries registry hints onto diagnostics", () => {
    const diagnostic = diagnosticFromCode({
      code: "RS0004",
      params: { kind: "ambiguous-name", name: "Point", count: 2 },
      span,
    });
    expect(diagnostic.hints?.[0]?.message).toBe(
      "Restrict the reference to one item kind or use a qualified path.",
    );
  });

  it("lets callers override severity for notes", () => {
    const note = diagnosticFromCode({
      code: "DC0001",
      params: { kind: "previous-declaration", name: "Point" },
      span,
      severity: "note",
    });
    expect(note.severity).toBe("note");
    expect(hasErrors([note])).toBe(false);
  });

  it("treats unreachable modules as warnings", () => {
    const warning = diagnosticFromCode({
      code: "MT0005",
      params: { kind: "unreachable-module", target: "orphan" },
      span,
    });
    expect(warning.severity).toBe("warning");
    expect(hasErrors([warning])).toBe(false);
  });

  it("normalizes to the first available span", () => {
    const fallback = { file: "fallback", start: 0, end: 0 };
    expect(normalizeSpan(undefined, fallback)).toEqual(fallback);
    expect(normalizeSpan()).toEqual({ file: "<unknown>", start: 0, end: 0 });
  });

  it("registers one definition per code, keyed by that code", () => {
    const codes = diagnosticCodes();
    expect(codes).toHaveLength(17);
    codes.forEach((code) => {
      expect(getDiagnosticDefinition(code).code).toBe(code);
    });
    expect(isDiagnosticCode("RS0003")).toBe(true);
    expect(isDiagnosticCode("XX0001")).toBe(false);
  });

  it("wraps diagnostics in a throwable error", () => {
    const diagnostic = diagnosticFromCode({
      code: "RS0003",
      params: { kind: "unresolved-name", name: "Missing" },
      span,
    });
    const error = new DiagnosticError(diagnostic);
    expect(error.message).toBe(
      "lib.ms:4-9 ERROR [resolution] RS0003: cannot find Missing in this scope",
    );
    expect(error.diagnostics).toEqual([diagnostic]);
  });
});
