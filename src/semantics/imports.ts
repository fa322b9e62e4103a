import { diagnosticFromCode, type Diagnostic } from "../diagnostics/index.js";
import { modulePathToString, resolveModulePrefix } from "../modules/path.js";
import { getSccGroups } from "../modules/scc.js";
import type { ModuleTree, Visibility } from "../modules/types.js";
import { parseUsePaths, type NormalizedUseEntry } from "../modules/use-path.js";
import { PerfRecorder } from "../perf.js";
import {
  declarationKey,
  getSymbolTable,
  type Declaration,
  type SymbolTables,
} from "./declarations.js";
import type { ModuleId, SourceSpan } from "./ids.js";
import { isDeclarationVisibleFrom, isVisibleFrom } from "./lookup.js";
import type { ResolverOptions } from "./options.js";

export interface ImportBinding {
  /** Importing module. */
  module: ModuleId;
  name: string;
  /** More than one entry when the imported name exists in several item kinds. */
  declarations: readonly Declaration[];
  visibility: Visibility;
  path: string;
  span: SourceSpan;
}

export class ImportScope {
  readonly module: ModuleId;
  #bindings = new Map<string, ImportBinding>();

  constructor(module: ModuleId) {
    this.module = module;
  }

  get(name: string): ImportBinding | undefined {
    return this.#bindings.get(name);
  }

  bindings(): ImportBinding[] {
    return Array.from(this.#bindings.values());
  }

  /** Only the import pass binds names; scopes are read-only afterwards. */
  bind(binding: ImportBinding): void {
    this.#bindings.set(binding.name, binding);
  }
}

export type ImportResolution = {
  scopes: ReadonlyMap<ModuleId, ImportScope>;
  diagnostics: readonly Diagnostic[];
  /** Passes needed to reach the fixed point. */
  passes: number;
};

export const getImportScope = (
  imports: ImportResolution,
  module: ModuleId,
): ImportScope => {
  const scope = imports.scopes.get(module);
  if (!scope) {
    throw new Error(`no import scope for module ${module}`);
  }
  return scope;
};

type ImportState =
  | { kind: "pending"; waitingOn?: PendingImport }
  | { kind: "resolved"; declarations: readonly Declaration[] }
  | { kind: "failed" };

type PendingImport = {
  module: ModuleId;
  target: ModuleId;
  entry: NormalizedUseEntry;
  visibility: Visibility;
  span: SourceSpan;
  state: ImportState;
};

type ImportContext = {
  tree: ModuleTree;
  symbols: SymbolTables;
  options: ResolverOptions;
  diagnostics: Diagnostic[];
  /** Entries grouped by importing module and bound name, in source order. */
  entriesByModuleName: Map<ModuleId, Map<string, PendingImport[]>>;
};

/**
 * Resolves every `use` of the tree to a fixed point. Runs only after
 * declaration collection has finished for all modules.
 */
export const resolveImports = ({
  tree,
  symbols,
  options,
  perf = new PerfRecorder(false),
}: {
  tree: ModuleTree;
  symbols: SymbolTables;
  options: ResolverOptions;
  perf?: PerfRecorder;
}): ImportResolution => {
  const ctx: ImportContext = {
    tree,
    symbols,
    options,
    diagnostics: [],
    entriesByModuleName: new Map(),
  };

  const entries = collectImportEntries(ctx);
  perf.increment("imports.entries", entries.length);

  let pending = entries.filter((entry) => entry.state.kind === "pending");
  let passes = 0;
  while (pending.length > 0) {
    passes += 1;
    let progressed = false;
    for (const entry of pending) {
      entry.state = attemptImport(entry, ctx);
      if (entry.state.kind !== "pending") {
        progressed = true;
      }
    }
    pending = pending.filter((entry) => entry.state.kind === "pending");

    if (!progressed && pending.length > 0) {
      failImportCycles(pending, ctx);
      pending = pending.filter((entry) => entry.state.kind === "pending");
    }
  }
  perf.increment("imports.passes", passes);

  const scopes = bindImportScopes(entries, ctx);
  return { scopes, diagnostics: ctx.diagnostics, passes };
};

const collectImportEntries = (ctx: ImportContext): PendingImport[] => {
  const entries: PendingImport[] = [];

  ctx.tree.modules.forEach((node) => {
    const byName = new Map<string, PendingImport[]>();
    ctx.entriesByModuleName.set(node.id, byName);

    node.source.uses.forEach((use) => {
      const parsed = parseUsePaths(use.path);
      if (!parsed.ok) {
        ctx.diagnostics.push(
          diagnosticFromCode({
            code: "RS0006",
            params: { kind: "invalid-path", path: use.path, reason: parsed.reason },
            span: use.span,
            surface: use.path,
            phase: "imports",
          }),
        );
        return;
      }

      parsed.value.forEach((entry) => {
        const prefix = resolveModulePrefix({
          tree: ctx.tree,
          from: node.id,
          anchor: entry.anchor,
          segments: entry.segments,
          rootFallback: ctx.options.rootFallback,
        });
        if (prefix.kind === "unknown-module") {
          ctx.diagnostics.push(
            diagnosticFromCode({
              code: "IM0001",
              params: {
                kind: "unknown-import-module",
                path: entry.text,
                segment: prefix.segment,
              },
              span: use.span,
              surface: entry.text,
            }),
          );
          return;
        }

        const pendingImport: PendingImport = {
          module: node.id,
          target: prefix.module,
          entry,
          visibility: use.visibility,
          span: use.span,
          state: { kind: "pending" },
        };
        entries.push(pendingImport);
        const sameName = byName.get(entry.alias);
        if (sameName) {
          sameName.push(pendingImport);
        } else {
          byName.set(entry.alias, [pendingImport]);
        }
      });
    });
  });

  return entries;
};

const attemptImport = (entry: PendingImport, ctx: ImportContext): ImportState => {
  const { name } = entry.entry;
  const locals = getSymbolTable(ctx.symbols, entry.target).lookup(name);
  if (locals.length > 0) {
    return settleImport(entry, locals, ctx);
  }

  // An entry never satisfies itself, e.g. `use self::Missing`.
  const reexports = (ctx.entriesByModuleName.get(entry.target)?.get(name) ?? []).filter(
    (candidate) => candidate !== entry,
  );
  if (reexports.length === 0) {
    return failImport(
      diagnosticFromCode({
        code: "IM0001",
        params: {
          kind: "missing-import-target",
          path: entry.entry.text,
          name,
          module: modulePathToString(ctx.tree, entry.target),
        },
        span: entry.span,
        surface: entry.entry.text,
      }),
      ctx,
    );
  }

  // The target keeps the first entry that resolves; later ones are rejected
  // when scopes are bound, so only that one can be re-exported.
  const bound = reexports.find((candidate) => candidate.state.kind !== "failed");
  if (!bound) {
    const [first] = reexports;
    return failImport(
      diagnosticFromCode({
        code: "IM0001",
        params: {
          kind: "failed-reexport",
          path: entry.entry.text,
          reexport: first?.entry.text ?? name,
        },
        span: entry.span,
        surface: entry.entry.text,
      }),
      ctx,
    );
  }

  if (bound.state.kind === "pending") {
    return { kind: "pending", waitingOn: bound };
  }

  const visible = isVisibleFrom({
    tree: ctx.tree,
    owner: bound.module,
    visibility: bound.visibility,
    from: entry.module,
  });
  if (!visible) {
    return failImport(
      diagnosticFromCode({
        code: "RS0005",
        params: {
          kind: "private-declaration",
          name,
          owner: modulePathToString(ctx.tree, entry.target),
        },
        span: entry.span,
        surface: entry.entry.text,
        phase: "imports",
      }),
      ctx,
    );
  }
  if (bound.state.kind === "resolved") {
    return settleImport(entry, bound.state.declarations, ctx);
  }
  return { kind: "failed" };
};

const settleImport = (
  entry: PendingImport,
  declarations: readonly Declaration[],
  ctx: ImportContext,
): ImportState => {
  const visible = declarations.filter((declaration) =>
    isDeclarationVisibleFrom({ tree: ctx.tree, declaration, from: entry.module }),
  );
  if (visible.length > 0) {
    return { kind: "resolved", declarations: visible };
  }

  const [hidden] = declarations;
  return failImport(
    diagnosticFromCode({
      code: "RS0005",
      params: {
        kind: "private-declaration",
        name: entry.entry.name,
        owner: modulePathToString(ctx.tree, hidden?.module ?? entry.target),
      },
      span: entry.span,
      surface: entry.entry.text,
      phase: "imports",
    }),
    ctx,
  );
};

const failImport = (diagnostic: Diagnostic, ctx: ImportContext): ImportState => {
  ctx.diagnostics.push(diagnostic);
  return { kind: "failed" };
};

/** Every pending entry waits on another, so at least one group is cyclic. */
const failImportCycles = (pending: readonly PendingImport[], ctx: ImportContext) => {
  const groups = getSccGroups({
    nodes: pending,
    edgesOf: (entry) =>
      entry.state.kind === "pending" && entry.state.waitingOn
        ? [entry.state.waitingOn]
        : [],
  });

  groups
    .filter((group) => group.cyclic)
    .forEach((group) => {
      const cycle = group.members.map((member) => member.entry.text);
      group.members.forEach((member) => {
        member.state = failImport(
          diagnosticFromCode({
            code: "IM0003",
            params: { kind: "cyclic-import", path: member.entry.text, cycle },
            span: member.span,
            surface: member.entry.text,
          }),
          ctx,
        );
      });
    });
};

const sameDeclarationSet = (
  left: readonly Declaration[],
  right: readonly Declaration[],
): boolean => {
  const leftKeys = new Set(left.map(declarationKey));
  return (
    leftKeys.size === new Set(right.map(declarationKey)).size &&
    right.every((declaration) => leftKeys.has(declarationKey(declaration)))
  );
};

const bindImportScopes = (
  entries: readonly PendingImport[],
  ctx: ImportContext,
): Map<ModuleId, ImportScope> => {
  const scopes = new Map<ModuleId, ImportScope>(
    ctx.tree.modules.map((node) => [node.id, new ImportScope(node.id)]),
  );

  entries.forEach((entry) => {
    if (entry.state.kind !== "resolved") return;
    const scope = scopes.get(entry.module);
    if (!scope) return;
    const name = entry.entry.alias;
    const declarations = entry.state.declarations;

    const [local] = getSymbolTable(ctx.symbols, entry.module).lookup(name);
    if (local && ctx.options.localShadowing === "error") {
      ctx.diagnostics.push(
        diagnosticFromCode({
          code: "IM0002",
          params: {
            kind: "import-shadows-local",
            name,
            module: modulePathToString(ctx.tree, entry.module),
          },
          span: entry.span,
          surface: entry.entry.text,
          related: [
            diagnosticFromCode({
              code: "IM0002",
              params: { kind: "local-declaration", name },
              span: local.span,
              severity: "note",
            }),
          ],
        }),
      );
      return;
    }

    const existing = scope.get(name);
    if (existing) {
      if (sameDeclarationSet(existing.declarations, declarations)) return;
      ctx.diagnostics.push(
        diagnosticFromCode({
          code: "IM0002",
          params: {
            kind: "duplicate-import",
            name,
            module: modulePathToString(ctx.tree, entry.module),
          },
          span: entry.span,
          surface: entry.entry.text,
          related: [
            diagnosticFromCode({
              code: "IM0002",
              params: { kind: "previous-binding", name },
              span: existing.span,
              severity: "note",
            }),
          ],
        }),
      );
      return;
    }

    scope.bind({
      module: entry.module,
      name,
      declarations,
      visibility: entry.visibility,
      path: entry.entry.text,
      span: entry.span,
    });
  });

  return scopes;
};
