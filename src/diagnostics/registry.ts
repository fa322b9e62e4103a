import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
  ResolutionErrorKind,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

const exhaustive = (_value: never): never => _value;

export type DiagnosticDefinition<P> = {
  code: string;
  errorKind: ResolutionErrorKind;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

type DiagnosticParamsMap = {
  MT0001:
    | { kind: "duplicate-module"; name: string; parent: string }
    | { kind: "previous-module"; name: string };
  MT0002: { kind: "cyclic-module-graph"; cycle: readonly string[] };
  MT0003:
    | { kind: "missing-module"; name: string; target: string }
    | { kind: "missing-root"; root: string };
  MT0004:
    | { kind: "module-declared-twice"; target: string; parent: string }
    | { kind: "previous-parent"; parent: string };
  MT0005: { kind: "unreachable-module"; target: string };
  MT0006:
    | { kind: "reserved-module-name"; name: string }
    | { kind: "invalid-module-name"; name: string };
  DC0001:
    | {
        kind: "duplicate-declaration";
        name: string;
        declarationKind: string;
        module: string;
      }
    | { kind: "previous-declaration"; name: string };
  DC0002: { kind: "invalid-declaration-name"; name: string; declarationKind: string };
  IM0001:
    | { kind: "unknown-import-module"; path: string; segment: string }
    | { kind: "missing-import-target"; path: string; name: string; module: string }
    | { kind: "failed-reexport"; path: string; reexport: string };
  IM0002:
    | { kind: "duplicate-import"; name: string; module: string }
    | { kind: "import-shadows-local"; name: string; module: string }
    | { kind: "previous-binding"; name: string }
    | { kind: "local-declaration"; name: string };
  IM0003: { kind: "cyclic-import"; path: string; cycle: readonly string[] };
  RS0001: { kind: "unknown-module"; segment: string; module: string };
  RS0002: { kind: "unknown-declaration"; name: string; module: string };
  RS0003: { kind: "unresolved-name"; name: string };
  RS0004: { kind: "ambiguous-name"; name: string; count: number };
  RS0005: { kind: "private-declaration"; name: string; owner: string };
  RS0006: { kind: "invalid-path"; path: string; reason: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  MT0001: {
    code: "MT0001",
    errorKind: "DuplicateModuleName",
    message: (params) =>
      params.kind === "duplicate-module"
        ? `module ${params.name} is declared more than once in ${params.parent}`
        : `module ${params.name} first declared here`,
    severity: "error",
    phase: "module-tree",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MT0001"]>,
  MT0002: {
    code: "MT0002",
    errorKind: "CyclicModuleGraph",
    message: (params) =>
      `mod declarations form a cycle: ${[...params.cycle, params.cycle[0]].join(" -> ")}`,
    severity: "error",
    phase: "module-tree",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MT0002"]>,
  MT0003: {
    code: "MT0003",
    errorKind: "MissingModule",
    message: (params) =>
      params.kind === "missing-module"
        ? `mod ${params.name} refers to unknown module ${params.target}`
        : `root module ${params.root} is not part of the unit`,
    severity: "error",
    phase: "module-tree",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MT0003"]>,
  MT0004: {
    code: "MT0004",
    errorKind: "ModuleDeclaredTwice",
    message: (params) =>
      params.kind === "module-declared-twice"
        ? `module ${params.target} cannot also be a child of ${params.parent}`
        : `already declared as a child of ${params.parent}`,
    severity: "error",
    phase: "module-tree",
    hints: [
      {
        message: "A module has exactly one parent; reach it from elsewhere with a `use` or a qualified path.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MT0004"]>,
  MT0005: {
    code: "MT0005",
    errorKind: "UnreachableModule",
    message: (params) =>
      `module ${params.target} is not reachable from the root and was skipped`,
    severity: "warning",
    phase: "module-tree",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MT0005"]>,
  MT0006: {
    code: "MT0006",
    errorKind: "InvalidModuleName",
    message: (params) =>
      params.kind === "reserved-module-name"
        ? `${params.name} is a path keyword and cannot name a module`
        : `${params.name} is not a valid module name`,
    severity: "error",
    phase: "module-tree",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MT0006"]>,
  DC0001: {
    code: "DC0001",
    errorKind: "DuplicateDeclaration",
    message: (params) =>
      params.kind === "duplicate-declaration"
        ? `${params.declarationKind} ${params.name} is declared more than once in ${params.module}`
        : `previous declaration of ${params.name} here`,
    severity: "error",
    phase: "declarations",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0001"]>,
  DC0002: {
    code: "DC0002",
    errorKind: "InvalidDeclarationName",
    message: (params) => `${params.name} is not a valid ${params.declarationKind} name`,
    severity: "error",
    phase: "declarations",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0002"]>,
  IM0001: {
    code: "IM0001",
    errorKind: "UnresolvedImport",
    message: (params) => {
      switch (params.kind) {
        case "unknown-import-module":
          return `unresolved import ${params.path}: no module named ${params.segment}`;
        case "missing-import-target":
          return `unresolved import ${params.path}: ${params.module} has no item named ${params.name}`;
        case "failed-reexport":
          return `unresolved import ${params.path}: re-export ${params.reexport} did not resolve`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "imports",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IM0001"]>,
  IM0002: {
    code: "IM0002",
    errorKind: "DuplicateImport",
    message: (params) => {
      switch (params.kind) {
        case "duplicate-import":
          return `${params.name} is imported more than once into ${params.module} with different targets`;
        case "import-shadows-local":
          return `import of ${params.name} collides with a declaration in ${params.module}`;
        case "previous-binding":
          return `${params.name} first imported here`;
        case "local-declaration":
          return `${params.name} declared here`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "imports",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IM0002"]>,
  IM0003: {
    code: "IM0003",
    errorKind: "CyclicImport",
    message: (params) =>
      `import ${params.path} never resolves; imports wait on each other: ${params.cycle.join(", ")}`,
    severity: "error",
    phase: "imports",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IM0003"]>,
  RS0001: {
    code: "RS0001",
    errorKind: "UnknownModule",
    message: (params) =>
      `unknown module ${params.segment} in ${params.module}`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0001"]>,
  RS0002: {
    code: "RS0002",
    errorKind: "UnknownDeclaration",
    message: (params) => `${params.module} has no item named ${params.name}`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0002"]>,
  RS0003: {
    code: "RS0003",
    errorKind: "UnresolvedName",
    message: (params) => `cannot find ${params.name} in this scope`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0003"]>,
  RS0004: {
    code: "RS0004",
    errorKind: "AmbiguousName",
    message: (params) =>
      `${params.name} is ambiguous; ${params.count} declarations match`,
    severity: "error",
    phase: "resolution",
    hints: [
      {
        message: "Restrict the reference to one item kind or use a qualified path.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0004"]>,
  RS0005: {
    code: "RS0005",
    errorKind: "PrivateDeclaration",
    message: (params) => `${params.name} is private to ${params.owner}`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0005"]>,
  RS0006: {
    code: "RS0006",
    errorKind: "InvalidPath",
    message: (params) => `invalid path "${params.path}": ${params.reason}`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0006"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);

export const isDiagnosticCode = (value: string): value is DiagnosticCode =>
  Object.prototype.hasOwnProperty.call(diagnosticsRegistry, value);
