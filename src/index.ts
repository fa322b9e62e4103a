export * from "./diagnostics/index.js";
export type {
  ItemKind,
  ModuleNode,
  ModuleTree,
  SourceItem,
  SourceModDecl,
  SourceModule,
  SourceReference,
  SourceUnit,
  SourceUse,
  Visibility,
} from "./modules/types.js";
export { ITEM_KINDS } from "./modules/types.js";
export { buildModuleTree } from "./modules/tree.js";
export {
  ROOT_MODULE_NAME,
  getModule,
  modulePathToString,
  relativePathBetween,
} from "./modules/path.js";
export {
  formatQualifiedPath,
  parseQualifiedPath,
  parseUsePaths,
  type NormalizedUseEntry,
  type PathAnchor,
  type QualifiedPath,
} from "./modules/use-path.js";
export type { ModuleId, DeclarationId } from "./semantics/ids.js";
export {
  collectDeclarations,
  getSymbolTable,
  sameDeclaration,
  SymbolTable,
  type Declaration,
  type SymbolTables,
} from "./semantics/declarations.js";
export {
  getImportScope,
  ImportScope,
  resolveImports,
  type ImportBinding,
  type ImportResolution,
} from "./semantics/imports.js";
export {
  DEFAULT_RESOLVER_OPTIONS,
  resolveOptions,
  type LocalShadowingPolicy,
  type ResolverOptions,
} from "./semantics/options.js";
export {
  PathResolver,
  type ResolutionOutcome,
  type ResolutionVia,
  type ResolvedReference,
  type UseSite,
} from "./semantics/resolver.js";
export {
  analyzeUnit,
  type AnalysisResult,
  type AnalyzeUnitOptions,
} from "./semantics/pipeline.js";
export { PerfRecorder } from "./perf.js";
export { createFsUnitHost, createMemoryUnitHost, type UnitHost } from "./unit/host.js";
export { loadUnitFile, parseUnit, parseUnitText, UnitFormatError } from "./unit/load.js";
export {
  createReport,
  reportToJson,
  REPORT_VERSION,
  type ResolutionReport,
} from "./report/report.js";
export { decodeReport, encodeReport, ReportDecodeError } from "./report/codec.js";
