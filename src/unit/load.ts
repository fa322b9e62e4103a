import { ITEM_KINDS } from "../modules/types.js";
import type {
  ItemKind,
  SourceItem,
  SourceModDecl,
  SourceModule,
  SourceReference,
  SourceUnit,
  SourceUse,
  Visibility,
} from "../modules/types.js";
import type { SourceSpan } from "../diagnostics/index.js";
import { createFsUnitHost, type UnitHost } from "./host.js";

/** Malformed unit description. `location` is a path into the JSON, e.g. `modules[0].items[1].kind`. */
export class UnitFormatError extends Error {
  readonly location: string;
  readonly file?: string;

  constructor({
    location,
    reason,
    file,
  }: {
    location: string;
    reason: string;
    file?: string;
  }) {
    super(`${file ? `${file}: ` : ""}${location}: ${reason}`);
    this.name = "UnitFormatError";
    this.location = location;
    this.file = file;
  }
}

type ParseContext = {
  file?: string;
  /** Maps a module's `file` field to the path spans will refer to. */
  resolveFile: (file: string) => string;
};

type JsonObject = { [key: string]: unknown };

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isItemKind = (value: unknown): value is ItemKind =>
  ITEM_KINDS.some((kind) => kind === value);

const fail = (ctx: ParseContext, location: string, reason: string): never => {
  throw new UnitFormatError({ location, reason, file: ctx.file });
};

const expectObject = (value: unknown, location: string, ctx: ParseContext): JsonObject =>
  isObject(value) ? value : fail(ctx, location, "expected an object");

const expectString = (value: unknown, location: string, ctx: ParseContext): string =>
  typeof value === "string" && value.length > 0
    ? value
    : fail(ctx, location, "expected a non-empty string");

const expectArray = (value: unknown, location: string, ctx: ParseContext): unknown[] => {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : fail(ctx, location, "expected an array");
};

const expectVisibility = (value: unknown, location: string, ctx: ParseContext): Visibility => {
  if (value === undefined) return "private";
  if (typeof value !== "boolean") {
    return fail(ctx, location, "expected a boolean");
  }
  return value ? "pub" : "private";
};

const expectSpan = (
  value: unknown,
  location: string,
  file: string,
  ctx: ParseContext,
): SourceSpan => {
  if (!Array.isArray(value) || value.length !== 2) {
    return fail(ctx, location, "expected [start, end]");
  }
  const [start, end] = value;
  if (
    typeof start !== "number" ||
    typeof end !== "number" ||
    !Number.isInteger(start) ||
    !Number.isInteger(end) ||
    start < 0 ||
    end < start
  ) {
    return fail(ctx, location, "expected non-negative integer offsets with start <= end");
  }
  return { file, start, end };
};

const parseKinds = (
  value: unknown,
  location: string,
  ctx: ParseContext,
): ItemKind[] | undefined => {
  if (value === undefined) return undefined;
  return expectArray(value, location, ctx).map((kind, index) =>
    isItemKind(kind)
      ? kind
      : fail(ctx, `${location}[${index}]`, `expected one of ${ITEM_KINDS.join(", ")}`),
  );
};

const parseMod = (
  value: unknown,
  location: string,
  file: string,
  ctx: ParseContext,
): SourceModDecl => {
  const raw = expectObject(value, location, ctx);
  return {
    name: expectString(raw.name, `${location}.name`, ctx),
    module: expectString(raw.module, `${location}.module`, ctx),
    span: expectSpan(raw.span, `${location}.span`, file, ctx),
  };
};

const parseItem = (
  value: unknown,
  location: string,
  file: string,
  ctx: ParseContext,
): SourceItem => {
  const raw = expectObject(value, location, ctx);
  const name = expectString(raw.name, `${location}.name`, ctx);
  const kind = isItemKind(raw.kind)
    ? raw.kind
    : fail(ctx, `${location}.kind`, `expected one of ${ITEM_KINDS.join(", ")}`);
  return {
    name,
    kind,
    visibility: expectVisibility(raw.pub, `${location}.pub`, ctx),
    span: expectSpan(raw.span, `${location}.span`, file, ctx),
  };
};

const parseUse = (
  value: unknown,
  location: string,
  file: string,
  ctx: ParseContext,
): SourceUse => {
  const raw = expectObject(value, location, ctx);
  return {
    path: expectString(raw.path, `${location}.path`, ctx),
    visibility: expectVisibility(raw.pub, `${location}.pub`, ctx),
    span: expectSpan(raw.span, `${location}.span`, file, ctx),
  };
};

const parseReference = (
  value: unknown,
  location: string,
  file: string,
  ctx: ParseContext,
): SourceReference => {
  const raw = expectObject(value, location, ctx);
  const kinds = parseKinds(raw.kinds, `${location}.kinds`, ctx);
  return {
    path: expectString(raw.path, `${location}.path`, ctx),
    span: expectSpan(raw.span, `${location}.span`, file, ctx),
    ...(kinds ? { kinds } : {}),
  };
};

const parseModule = (value: unknown, location: string, ctx: ParseContext): SourceModule => {
  const raw = expectObject(value, location, ctx);
  const key = expectString(raw.key, `${location}.key`, ctx);
  const file = ctx.resolveFile(expectString(raw.file, `${location}.file`, ctx));
  const list = <T>(
    field: string,
    parse: (value: unknown, location: string, file: string, ctx: ParseContext) => T,
  ): T[] =>
    expectArray(raw[field], `${location}.${field}`, ctx).map((entry, index) =>
      parse(entry, `${location}.${field}[${index}]`, file, ctx),
    );

  return {
    key,
    file,
    mods: list("mods", parseMod),
    items: list("items", parseItem),
    uses: list("uses", parseUse),
    references: list("references", parseReference),
  };
};

/** Validates an already-decoded unit description. */
export const parseUnit = (
  value: unknown,
  {
    file,
    resolveFile = (moduleFile) => moduleFile,
  }: { file?: string; resolveFile?: (file: string) => string } = {},
): SourceUnit => {
  const ctx: ParseContext = { file, resolveFile };
  const raw = expectObject(value, "$", ctx);
  const root = expectString(raw.root, "root", ctx);
  const modules = expectArray(raw.modules, "modules", ctx).map((entry, index) =>
    parseModule(entry, `modules[${index}]`, ctx),
  );

  const seen = new Set<string>();
  modules.forEach((module, index) => {
    if (seen.has(module.key)) {
      fail(ctx, `modules[${index}].key`, `duplicate module key "${module.key}"`);
    }
    seen.add(module.key);
  });

  return { root, modules };
};

export const parseUnitText = (
  text: string,
  options: { file?: string; resolveFile?: (file: string) => string } = {},
): SourceUnit => {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new UnitFormatError({ location: "$", reason: `invalid JSON (${reason})`, file: options.file });
  }
  return parseUnit(decoded, options);
};

/** Reads a unit description; module files resolve relative to it. */
export const loadUnitFile = async (
  unitPath: string,
  host: UnitHost = createFsUnitHost(),
): Promise<SourceUnit> => {
  const file = host.path.resolve(unitPath);
  if (!(await host.fileExists(file))) {
    throw new Error(`unit file not found: ${file}`);
  }
  const text = await host.readFile(file);
  const dir = host.path.dirname(file);
  return parseUnitText(text, {
    file,
    resolveFile: (moduleFile) => host.path.resolve(dir, moduleFile),
  });
};
