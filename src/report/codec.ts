import { decode, encode } from "@msgpack/msgpack";
import {
  getDiagnosticDefinition,
  isDiagnosticCode,
  type Diagnostic,
  type DiagnosticCandidate,
  type DiagnosticHint,
  type DiagnosticPhase,
  type DiagnosticSeverity,
  type SourceSpan,
} from "../diagnostics/index.js";
import { ITEM_KINDS, type ItemKind, type Visibility } from "../modules/types.js";
import type { ResolutionVia } from "../semantics/resolver.js";
import {
  REPORT_VERSION,
  type ReportDeclaration,
  type ReportModule,
  type ReportReference,
  type ResolutionReport,
} from "./report.js";

const MSGPACK_OPTS = { ignoreUndefined: true } as const;

const SEVERITIES = ["error", "warning", "note"] as const satisfies readonly DiagnosticSeverity[];
const PHASES = [
  "module-tree",
  "declarations",
  "imports",
  "resolution",
] as const satisfies readonly DiagnosticPhase[];
const VIAS = ["local", "import", "qualified"] as const satisfies readonly ResolutionVia[];

export class ReportDecodeError extends Error {
  readonly location: string;

  constructor(location: string, reason: string) {
    super(`invalid report at ${location}: ${reason}`);
    this.name = "ReportDecodeError";
    this.location = location;
  }
}

type MsgPackMap = { [key: string]: unknown };

const isRecord = (value: unknown): value is MsgPackMap =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const oneOf = <T extends string>(
  values: readonly T[],
  value: unknown,
  location: string,
): T => {
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ReportDecodeError(location, `expected one of ${values.join(", ")}`);
  }
  return match;
};

const record = (value: unknown, location: string): MsgPackMap => {
  if (!isRecord(value)) throw new ReportDecodeError(location, "expected a map");
  return value;
};

const array = (value: unknown, location: string): unknown[] => {
  if (!Array.isArray(value)) throw new ReportDecodeError(location, "expected an array");
  return value;
};

const string = (value: unknown, location: string): string => {
  if (typeof value !== "string") throw new ReportDecodeError(location, "expected a string");
  return value;
};

const integer = (value: unknown, location: string): number => {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ReportDecodeError(location, "expected an integer");
  }
  return value;
};

const optional = <T>(
  value: unknown,
  location: string,
  read: (value: unknown, location: string) => T,
): T | undefined => (value === undefined || value === null ? undefined : read(value, location));

const span = (value: unknown, location: string): SourceSpan => {
  const raw = record(value, location);
  return {
    file: string(raw.file, `${location}.file`),
    start: integer(raw.start, `${location}.start`),
    end: integer(raw.end, `${location}.end`),
  };
};

const hint = (value: unknown, location: string): DiagnosticHint => ({
  message: string(record(value, location).message, `${location}.message`),
});

const candidate = (value: unknown, location: string): DiagnosticCandidate => {
  const raw = record(value, location);
  return {
    path: string(raw.path, `${location}.path`),
    kind: string(raw.kind, `${location}.kind`),
  };
};

const list = <T>(
  value: unknown,
  location: string,
  read: (value: unknown, location: string) => T,
): T[] => array(value, location).map((entry, index) => read(entry, `${location}[${index}]`));

const diagnostic = (value: unknown, location: string): Diagnostic => {
  const raw = record(value, location);
  const code = string(raw.code, `${location}.code`);
  const related = optional(raw.related, `${location}.related`, (entries, at) =>
    list(entries, at, diagnostic),
  );
  const phase = optional(raw.phase, `${location}.phase`, (entry, at) => oneOf(PHASES, entry, at));
  const hints = optional(raw.hints, `${location}.hints`, (entries, at) => list(entries, at, hint));
  const surface = optional(raw.surface, `${location}.surface`, string);
  const candidates = optional(raw.candidates, `${location}.candidates`, (entries, at) =>
    list(entries, at, candidate),
  );

  return {
    code,
    message: string(raw.message, `${location}.message`),
    severity: oneOf(SEVERITIES, raw.severity, `${location}.severity`),
    span: span(raw.span, `${location}.span`),
    ...(related ? { related } : {}),
    ...(phase ? { phase } : {}),
    ...(hints ? { hints } : {}),
    ...(isDiagnosticCode(code) ? { errorKind: getDiagnosticDefinition(code).errorKind } : {}),
    ...(surface === undefined ? {} : { surface }),
    ...(candidates ? { candidates } : {}),
  };
};

const reportModule = (value: unknown, location: string): ReportModule => {
  const raw = record(value, location);
  const parent = optional(raw.parent, `${location}.parent`, integer);
  return {
    id: integer(raw.id, `${location}.id`),
    key: string(raw.key, `${location}.key`),
    path: string(raw.path, `${location}.path`),
    file: string(raw.file, `${location}.file`),
    ...(parent === undefined ? {} : { parent }),
  };
};

const reportDeclaration = (value: unknown, location: string): ReportDeclaration => {
  const raw = record(value, location);
  const kind: ItemKind = oneOf(ITEM_KINDS, raw.kind, `${location}.kind`);
  const visibility: Visibility = oneOf(["pub", "private"], raw.visibility, `${location}.visibility`);
  return {
    id: integer(raw.id, `${location}.id`),
    module: integer(raw.module, `${location}.module`),
    name: string(raw.name, `${location}.name`),
    kind,
    visibility,
    path: string(raw.path, `${location}.path`),
    span: span(raw.span, `${location}.span`),
  };
};

const reportReference = (value: unknown, location: string): ReportReference => {
  const raw = record(value, location);
  const base = {
    module: integer(raw.module, `${location}.module`),
    path: string(raw.path, `${location}.path`),
    span: span(raw.span, `${location}.span`),
  };
  const status = oneOf(["resolved", "error"], raw.status, `${location}.status`);
  if (status === "resolved") {
    return {
      status,
      ...base,
      declaration: integer(raw.declaration, `${location}.declaration`),
      via: oneOf(VIAS, raw.via, `${location}.via`),
    };
  }
  return {
    status,
    ...base,
    code: string(raw.code, `${location}.code`),
    candidates: list(raw.candidates, `${location}.candidates`, integer),
  };
};

/** Checks a decoded value against the report shape, field by field. */
export const toResolutionReport = (value: unknown): ResolutionReport => {
  const raw = record(value, "$");
  if (raw.version !== REPORT_VERSION) {
    throw new ReportDecodeError("version", `expected ${REPORT_VERSION}`);
  }
  return {
    version: REPORT_VERSION,
    root: string(raw.root, "root"),
    modules: list(raw.modules, "modules", reportModule),
    declarations: list(raw.declarations, "declarations", reportDeclaration),
    references: list(raw.references, "references", reportReference),
    diagnostics: list(raw.diagnostics, "diagnostics", diagnostic),
  };
};

export const encodeReport = (report: ResolutionReport): Uint8Array =>
  encode(report, MSGPACK_OPTS);

export const decodeReport = (bytes: ArrayLike<number> | ArrayBufferView | ArrayBuffer): ResolutionReport =>
  toResolutionReport(decode(bytes));
