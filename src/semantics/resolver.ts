import {
  diagnosticFromCode,
  type Diagnostic,
  type DiagnosticCandidate,
} from "../diagnostics/index.js";
import {
  modulePathToString,
  relativePathBetween,
  resolveModulePrefix,
} from "../modules/path.js";
import type { ItemKind, ModuleTree } from "../modules/types.js";
import {
  isBarePath,
  parseQualifiedPath,
  type QualifiedPath,
} from "../modules/use-path.js";
import {
  getSymbolTable,
  type Declaration,
  type SymbolTables,
} from "./declarations.js";
import type { ModuleId, SourceSpan } from "./ids.js";
import { getImportScope, type ImportResolution } from "./imports.js";
import {
  filterKinds,
  isDeclarationVisibleFrom,
  isVisibleFrom,
  toLookupOutcome,
} from "./lookup.js";
import type { ResolverOptions } from "./options.js";

export interface UseSite {
  module: ModuleId;
  path: string;
  span: SourceSpan;
  /** Restricts the lookup to these item kinds. */
  kinds?: readonly ItemKind[];
}

export type ResolutionVia = "local" | "import" | "qualified";

export type ResolvedReference =
  | {
      kind: "resolved";
      site: UseSite;
      declaration: Declaration;
      via: ResolutionVia;
    }
  | {
      kind: "error";
      site: UseSite;
      diagnostic: Diagnostic;
      candidates: readonly Declaration[];
    };

type ResolutionFailure =
  | { kind: "invalid-path"; reason: string }
  | { kind: "unknown-module"; segment: string; module: ModuleId }
  | { kind: "unknown-declaration"; name: string; module: ModuleId }
  | { kind: "unresolved-name"; name: string; suggestions: readonly Declaration[] }
  | { kind: "ambiguous-name"; name: string; candidates: readonly Declaration[] }
  | {
      kind: "private-declaration";
      name: string;
      owner: ModuleId;
      candidates: readonly Declaration[];
    };

export type ResolutionOutcome =
  | { kind: "resolved"; declaration: Declaration; via: ResolutionVia }
  | { kind: "failed"; failure: ResolutionFailure };

const kindsKey = (kinds?: readonly ItemKind[]): string =>
  kinds && kinds.length > 0 ? [...kinds].sort().join(",") : "*";

/**
 * Answers `resolve(useSite)` against frozen symbol tables and import scopes.
 * Outcomes are memoized; a site asked twice gets the same reference back and
 * its failure is reported once.
 */
export class PathResolver {
  readonly tree: ModuleTree;
  readonly symbols: SymbolTables;
  readonly imports: ImportResolution;
  readonly options: ResolverOptions;
  #outcomes = new Map<string, ResolutionOutcome>();
  #references = new Map<string, ResolvedReference>();
  #diagnostics: Diagnostic[] = [];

  constructor({
    tree,
    symbols,
    imports,
    options,
  }: {
    tree: ModuleTree;
    symbols: SymbolTables;
    imports: ImportResolution;
    options: ResolverOptions;
  }) {
    this.tree = tree;
    this.symbols = symbols;
    this.imports = imports;
    this.options = options;
  }

  /** Failures of every site resolved so far, in first-seen order. */
  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics;
  }

  resolve(site: UseSite): ResolvedReference {
    const { file, start, end } = site.span;
    const siteKey = `${site.module}\u0000${site.path}\u0000${kindsKey(site.kinds)}\u0000${file}:${start}:${end}`;
    const cached = this.#references.get(siteKey);
    if (cached) return cached;

    const outcome = this.lookup(site.module, site.path, site.kinds);
    const reference: ResolvedReference =
      outcome.kind === "resolved"
        ? { kind: "resolved", site, declaration: outcome.declaration, via: outcome.via }
        : this.#failedReference(site, outcome.failure);

    if (reference.kind === "error") {
      this.#diagnostics.push(reference.diagnostic);
    }
    this.#references.set(siteKey, reference);
    return reference;
  }

  lookup(
    module: ModuleId,
    pathText: string,
    kinds?: readonly ItemKind[],
  ): ResolutionOutcome {
    const key = `${module}\u0000${pathText}\u0000${kindsKey(kinds)}`;
    const cached = this.#outcomes.get(key);
    if (cached) return cached;

    const parsed = parseQualifiedPath(pathText);
    const outcome: ResolutionOutcome = !parsed.ok
      ? { kind: "failed", failure: { kind: "invalid-path", reason: parsed.reason } }
      : isBarePath(parsed.value)
        ? this.#resolveBare(module, parsed.value.name, kinds)
        : this.#resolveQualified(module, parsed.value, kinds);
    this.#outcomes.set(key, outcome);
    return outcome;
  }

  /** Canonical absolute path, e.g. `crate::another_lib::VeryCommonNameStruct`. */
  qualifiedPathTo(declaration: Declaration): string {
    return `${modulePathToString(this.tree, declaration.module)}::${declaration.name}`;
  }

  relativePathFrom(from: ModuleId, declaration: Declaration): string {
    return relativePathBetween({
      tree: this.tree,
      from,
      to: declaration.module,
      name: declaration.name,
    });
  }

  #resolveBare(
    module: ModuleId,
    name: string,
    kinds?: readonly ItemKind[],
  ): ResolutionOutcome {
    const locals = filterKinds(getSymbolTable(this.symbols, module).lookup(name), kinds);
    if (locals.length > 0) {
      return this.#outcomeFor(name, locals, "local");
    }

    const binding = getImportScope(this.imports, module).get(name);
    const imported = filterKinds(binding?.declarations ?? [], kinds);
    if (imported.length > 0) {
      return this.#outcomeFor(name, imported, "import");
    }

    const suggestions = this.symbols.declarations.filter(
      (declaration) =>
        declaration.name === name &&
        filterKinds([declaration], kinds).length > 0 &&
        isDeclarationVisibleFrom({ tree: this.tree, declaration, from: module }),
    );
    return { kind: "failed", failure: { kind: "unresolved-name", name, suggestions } };
  }

  #resolveQualified(
    module: ModuleId,
    path: QualifiedPath,
    kinds?: readonly ItemKind[],
  ): ResolutionOutcome {
    const prefix = resolveModulePrefix({
      tree: this.tree,
      from: module,
      anchor: path.anchor,
      segments: path.segments,
      rootFallback: this.options.rootFallback,
    });
    if (prefix.kind === "unknown-module") {
      return {
        kind: "failed",
        failure: { kind: "unknown-module", segment: prefix.segment, module: prefix.module },
      };
    }

    const target = prefix.module;
    const locals = filterKinds(getSymbolTable(this.symbols, target).lookup(path.name), kinds);
    if (locals.length > 0) {
      return this.#visibleOutcome(module, path.name, locals);
    }

    const binding = getImportScope(this.imports, target).get(path.name);
    const reexported = filterKinds(binding?.declarations ?? [], kinds);
    if (!binding || reexported.length === 0) {
      return {
        kind: "failed",
        failure: { kind: "unknown-declaration", name: path.name, module: target },
      };
    }
    if (
      !isVisibleFrom({ tree: this.tree, owner: target, visibility: binding.visibility, from: module })
    ) {
      return {
        kind: "failed",
        failure: {
          kind: "private-declaration",
          name: path.name,
          owner: target,
          candidates: reexported,
        },
      };
    }
    return this.#visibleOutcome(module, path.name, reexported);
  }

  #visibleOutcome(
    from: ModuleId,
    name: string,
    candidates: readonly Declaration[],
  ): ResolutionOutcome {
    const visible = candidates.filter((declaration) =>
      isDeclarationVisibleFrom({ tree: this.tree, declaration, from }),
    );
    if (visible.length === 0) {
      const [hidden] = candidates;
      return {
        kind: "failed",
        failure: {
          kind: "private-declaration",
          name,
          owner: hidden?.module ?? from,
          candidates,
        },
      };
    }
    return this.#outcomeFor(name, visible, "qualified");
  }

  #outcomeFor(
    name: string,
    candidates: readonly Declaration[],
    via: ResolutionVia,
  ): ResolutionOutcome {
    const outcome = toLookupOutcome(candidates);
    switch (outcome.kind) {
      case "unique":
        return { kind: "resolved", declaration: outcome.declaration, via };
      case "ambiguous":
        return {
          kind: "failed",
          failure: { kind: "ambiguous-name", name, candidates: outcome.candidates },
        };
      case "not-found":
        return { kind: "failed", failure: { kind: "unresolved-name", name, suggestions: [] } };
    }
  }

  #candidate(declaration: Declaration): DiagnosticCandidate {
    return { path: this.qualifiedPathTo(declaration), kind: declaration.kind };
  }

  #failedReference(site: UseSite, failure: ResolutionFailure): ResolvedReference {
    const shared = { span: site.span, surface: site.path };
    switch (failure.kind) {
      case "invalid-path":
        return {
          kind: "error",
          site,
          candidates: [],
          diagnostic: diagnosticFromCode({
            ...shared,
            code: "RS0006",
            params: { kind: "invalid-path", path: site.path, reason: failure.reason },
          }),
        };
      case "unknown-module":
        return {
          kind: "error",
          site,
          candidates: [],
          diagnostic: diagnosticFromCode({
            ...shared,
            code: "RS0001",
            params: {
              kind: "unknown-module",
              segment: failure.segment,
              module: modulePathToString(this.tree, failure.module),
            },
          }),
        };
      case "unknown-declaration":
        return {
          kind: "error",
          site,
          candidates: [],
          diagnostic: diagnosticFromCode({
            ...shared,
            code: "RS0002",
            params: {
              kind: "unknown-declaration",
              name: failure.name,
              module: modulePathToString(this.tree, failure.module),
            },
          }),
        };
      case "unresolved-name":
        return {
          kind: "error",
          site,
          candidates: failure.suggestions,
          diagnostic: diagnosticFromCode({
            ...shared,
            code: "RS0003",
            params: { kind: "unresolved-name", name: failure.name },
            candidates: failure.suggestions.map((declaration) => this.#candidate(declaration)),
            hints:
              failure.suggestions.length > 0
                ? failure.suggestions.map((declaration) => ({
                    message: `did you mean \`${this.relativePathFrom(site.module, declaration)}\`?`,
                  }))
                : undefined,
          }),
        };
      case "ambiguous-name":
        return {
          kind: "error",
          site,
          candidates: failure.candidates,
          diagnostic: diagnosticFromCode({
            ...shared,
            code: "RS0004",
            params: {
              kind: "ambiguous-name",
              name: failure.name,
              count: failure.candidates.length,
            },
            candidates: failure.candidates.map((declaration) => this.#candidate(declaration)),
          }),
        };
      case "private-declaration":
        return {
          kind: "error",
          site,
          candidates: failure.candidates,
          diagnostic: diagnosticFromCode({
            ...shared,
            code: "RS0005",
            params: {
              kind: "private-declaration",
              name: failure.name,
              owner: modulePathToString(this.tree, failure.owner),
            },
            candidates: failure.candidates.map((declaration) => this.#candidate(declaration)),
          }),
        };
    }
  }
}
