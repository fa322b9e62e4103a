import type { Diagnostic, SourceSpan } from "../diagnostics/index.js";
import { modulePathToString } from "../modules/path.js";
import type { ItemKind, Visibility } from "../modules/types.js";
import type { AnalysisResult } from "../semantics/pipeline.js";
import type { ResolutionVia } from "../semantics/resolver.js";

export const REPORT_VERSION = 1;

export interface ReportModule {
  id: number;
  key: string;
  /** Canonical path, `crate` for the root. */
  path: string;
  file: string;
  parent?: number;
}

export interface ReportDeclaration {
  id: number;
  module: number;
  name: string;
  kind: ItemKind;
  visibility: Visibility;
  /** `crate::a::Name` */
  path: string;
  span: SourceSpan;
}

export type ReportReference =
  | {
      status: "resolved";
      module: number;
      path: string;
      span: SourceSpan;
      declaration: number;
      via: ResolutionVia;
    }
  | {
      status: "error";
      module: number;
      path: string;
      span: SourceSpan;
      code: string;
      /** Declaration ids the failure points at, for ambiguity and suggestions. */
      candidates: number[];
    };

/** Plain-data summary of one analysis, for JSON and MessagePack consumers. */
export interface ResolutionReport {
  version: typeof REPORT_VERSION;
  root: string;
  modules: ReportModule[];
  declarations: ReportDeclaration[];
  references: ReportReference[];
  diagnostics: Diagnostic[];
}

export const createReport = (result: AnalysisResult): ResolutionReport => {
  const { tree, symbols, resolver } = result;
  const root = tree.modules[tree.root];

  return {
    version: REPORT_VERSION,
    root: root?.key ?? "",
    modules: tree.modules.map((node) => ({
      id: node.id,
      key: node.key,
      path: modulePathToString(tree, node.id),
      file: node.source.file,
      ...(node.parent === undefined ? {} : { parent: node.parent }),
    })),
    declarations: symbols.declarations.map((declaration) => ({
      id: declaration.id,
      module: declaration.module,
      name: declaration.name,
      kind: declaration.kind,
      visibility: declaration.visibility,
      path: resolver.qualifiedPathTo(declaration),
      span: declaration.span,
    })),
    references: result.references.map((reference): ReportReference => {
      const { module, path, span } = reference.site;
      if (reference.kind === "resolved") {
        return {
          status: "resolved",
          module,
          path,
          span,
          declaration: reference.declaration.id,
          via: reference.via,
        };
      }
      return {
        status: "error",
        module,
        path,
        span,
        code: reference.diagnostic.code,
        candidates: reference.candidates.map((candidate) => candidate.id),
      };
    }),
    diagnostics: [...result.diagnostics],
  };
};

export const reportToJson = (report: ResolutionReport): string =>
  JSON.stringify(report, undefined, 2);
