import type { Diagnostic } from "../diagnostics/index.js";
import type { AnalysisResult } from "../semantics/pipeline.js";
import type { PathResolver, ResolvedReference } from "../semantics/resolver.js";

const plural = (count: number, noun: string) =>
  `${count} ${noun}${count === 1 ? "" : "s"}`;

const countSeverity = (
  diagnostics: readonly Diagnostic[],
  severity: Diagnostic["severity"],
): number => diagnostics.filter((diagnostic) => diagnostic.severity === severity).length;

/** e.g. `3 modules, 4 declarations, 2/2 references resolved, 0 errors, 1 warning` */
export const formatSummary = (result: AnalysisResult): string => {
  const resolved = result.references.filter((reference) => reference.kind === "resolved");
  return [
    plural(result.tree.modules.length, "module"),
    plural(result.symbols.declarations.length, "declaration"),
    `${resolved.length}/${result.references.length} references resolved`,
    plural(countSeverity(result.diagnostics, "error"), "error"),
    plural(countSeverity(result.diagnostics, "warning"), "warning"),
  ].join(", ");
};

export type QueryOutput =
  | {
      path: string;
      status: "resolved";
      declaration: string;
      kind: string;
      via: string;
      relative: string;
    }
  | { path: string; status: "error"; code: string; message: string };

export const toQueryOutput = (
  resolver: PathResolver,
  reference: ResolvedReference,
): QueryOutput => {
  if (reference.kind === "error") {
    return {
      path: reference.site.path,
      status: "error",
      code: reference.diagnostic.code,
      message: reference.diagnostic.message,
    };
  }
  return {
    path: reference.site.path,
    status: "resolved",
    declaration: resolver.qualifiedPathTo(reference.declaration),
    kind: reference.declaration.kind,
    via: reference.via,
    relative: resolver.relativePathFrom(reference.site.module, reference.declaration),
  };
};

/** `Foo -> crate::lib::Foo (struct, via import)` */
export const formatQueryLine = (output: QueryOutput): string =>
  output.status === "resolved"
    ? `${output.path} -> ${output.declaration} (${output.kind}, via ${output.via})`
    : `${output.path} -> ${output.code}: ${output.message}`;
