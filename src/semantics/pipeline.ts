import type { Diagnostic } from "../diagnostics/index.js";
import { buildModuleTree } from "../modules/tree.js";
import type { ModuleTree, SourceUnit } from "../modules/types.js";
import { PerfRecorder } from "../perf.js";
import { collectDeclarations, type SymbolTables } from "./declarations.js";
import { resolveImports, type ImportResolution } from "./imports.js";
import { resolveOptions, type ResolverOptions } from "./options.js";
import { PathResolver, type ResolvedReference } from "./resolver.js";

export interface AnalysisResult {
  tree: ModuleTree;
  symbols: SymbolTables;
  imports: ImportResolution;
  resolver: PathResolver;
  /** Every reference listed by the unit, in module then source order. */
  references: readonly ResolvedReference[];
  diagnostics: readonly Diagnostic[];
}

export interface AnalyzeUnitOptions extends Partial<ResolverOptions> {
  perf?: PerfRecorder;
}

/**
 * Runs the passes in order. Each one finishes for the whole tree before the
 * next starts, and nothing mutates a table once its pass has returned.
 */
export const analyzeUnit = (
  unit: SourceUnit,
  { perf = new PerfRecorder(false), ...partial }: AnalyzeUnitOptions = {},
): AnalysisResult => {
  const options = resolveOptions(partial);

  const tree = perf.measure("modules", () => buildModuleTree(unit));
  perf.increment("modules.count", tree.modules.length);

  const symbols = perf.measure("declarations", () => collectDeclarations(tree));
  perf.increment("declarations.count", symbols.declarations.length);

  const imports = perf.measure("imports", () =>
    resolveImports({ tree, symbols, options, perf }),
  );

  const resolver = new PathResolver({ tree, symbols, imports, options });
  const references = perf.measure("references", () =>
    tree.modules.flatMap((node) =>
      node.source.references.map((reference) =>
        resolver.resolve({
          module: node.id,
          path: reference.path,
          span: reference.span,
          kinds: reference.kinds,
        }),
      ),
    ),
  );
  perf.increment("references.count", references.length);

  return {
    tree,
    symbols,
    imports,
    resolver,
    references,
    diagnostics: [
      ...tree.diagnostics,
      ...symbols.diagnostics,
      ...imports.diagnostics,
      ...resolver.diagnostics,
    ],
  };
};
