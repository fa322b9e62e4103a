export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase =
  | "module-tree"
  | "declarations"
  | "imports"
  | "resolution";

/** Enumerated resolution failure kinds carried by every registry diagnostic. */
export type ResolutionErrorKind =
  | "DuplicateModuleName"
  | "CyclicModuleGraph"
  | "MissingModule"
  | "ModuleDeclaredTwice"
  | "UnreachableModule"
  | "InvalidModuleName"
  | "DuplicateDeclaration"
  | "InvalidDeclarationName"
  | "UnresolvedImport"
  | "DuplicateImport"
  | "CyclicImport"
  | "UnknownModule"
  | "UnknownDeclaration"
  | "UnresolvedName"
  | "AmbiguousName"
  | "PrivateDeclaration"
  | "InvalidPath";

export interface SourceSpan {
  file: string;
  start: number;
  end: number;
}

export interface DiagnosticHint {
  message: string;
}

/** A declaration a diagnostic points at, rendered as a canonical path. */
export interface DiagnosticCandidate {
  path: string;
  kind: string;
}

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  span: SourceSpan;
  related?: readonly Diagnostic[];
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
  errorKind?: ResolutionErrorKind;
  /** Surface text of the path being resolved, when there is one. */
  surface?: string;
  candidates?: readonly DiagnosticCandidate[];
}

export type DiagnosticInput = {
  code: string;
  message: string;
  span: SourceSpan;
  severity?: DiagnosticSeverity;
  related?: readonly Diagnostic[];
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
  errorKind?: ResolutionErrorKind;
  surface?: string;
  candidates?: readonly DiagnosticCandidate[];
};
