/**
 * Arena indices shared by the tree builder, collector, import resolver and
 * path resolver. Treat them as opaque handles.
 */
export type ModuleId = number;
export type DeclarationId = number;

export type {
  SourceSpan,
  DiagnosticSeverity,
  Diagnostic,
  DiagnosticPhase,
} from "../diagnostics/index.js";
