import { diagnosticFromCode, type Diagnostic } from "../diagnostics/index.js";
import { modulePathToString } from "../modules/path.js";
import { isIdentifier } from "../modules/use-path.js";
import type {
  ItemKind,
  ModuleTree,
  SourceItem,
  Visibility,
} from "../modules/types.js";
import type { DeclarationId, ModuleId, SourceSpan } from "./ids.js";

export interface Declaration {
  id: DeclarationId;
  module: ModuleId;
  name: string;
  kind: ItemKind;
  visibility: Visibility;
  span: SourceSpan;
}

/** Identity of a declaration: owning module, bare name and item kind. */
export const declarationKey = (
  declaration: Pick<Declaration, "module" | "name" | "kind">,
): string => `${declaration.module}:${declaration.name}:${declaration.kind}`;

export const sameDeclaration = (left: Declaration, right: Declaration): boolean =>
  declarationKey(left) === declarationKey(right);

export class SymbolTable {
  readonly module: ModuleId;
  #byName = new Map<string, Declaration[]>();

  constructor(module: ModuleId) {
    this.module = module;
  }

  /** Returns the already-declared item with the same name and kind, if any. */
  find(name: string, kind: ItemKind): Declaration | undefined {
    return this.#byName.get(name)?.find((declaration) => declaration.kind === kind);
  }

  lookup(name: string): readonly Declaration[] {
    return this.#byName.get(name) ?? [];
  }

  has(name: string): boolean {
    return this.#byName.has(name);
  }

  declarations(): Declaration[] {
    return Array.from(this.#byName.values()).flat();
  }

  /** Only the collector adds entries; tables are read-only afterwards. */
  add(declaration: Declaration): void {
    const existing = this.#byName.get(declaration.name);
    if (existing) {
      existing.push(declaration);
      return;
    }
    this.#byName.set(declaration.name, [declaration]);
  }
}

export type SymbolTables = {
  declarations: readonly Declaration[];
  tables: ReadonlyMap<ModuleId, SymbolTable>;
  diagnostics: readonly Diagnostic[];
};

export const getSymbolTable = (
  symbols: SymbolTables,
  module: ModuleId,
): SymbolTable => {
  const table = symbols.tables.get(module);
  if (!table) {
    throw new Error(`no symbol table for module ${module}`);
  }
  return table;
};

const inSourceOrder = (items: readonly SourceItem[]): SourceItem[] =>
  items
    .map((item, index) => ({ item, index }))
    .sort(
      (left, right) =>
        left.item.span.start - right.item.span.start || left.index - right.index,
    )
    .map(({ item }) => item);

export const collectDeclarations = (tree: ModuleTree): SymbolTables => {
  const declarations: Declaration[] = [];
  const tables = new Map<ModuleId, SymbolTable>();
  const diagnostics: Diagnostic[] = [];

  tree.modules.forEach((node) => {
    const table = new SymbolTable(node.id);
    tables.set(node.id, table);

    inSourceOrder(node.source.items).forEach((item) => {
      // Such a name could never be written in a path.
      if (!isIdentifier(item.name)) {
        diagnostics.push(
          diagnosticFromCode({
            code: "DC0002",
            params: {
              kind: "invalid-declaration-name",
              name: item.name,
              declarationKind: item.kind,
            },
            span: item.span,
            surface: item.name,
          }),
        );
        return;
      }

      const previous = table.find(item.name, item.kind);
      if (previous) {
        diagnostics.push(
          diagnosticFromCode({
            code: "DC0001",
            params: {
              kind: "duplicate-declaration",
              name: item.name,
              declarationKind: item.kind,
              module: modulePathToString(tree, node.id),
            },
            span: item.span,
            surface: item.name,
            related: [
              diagnosticFromCode({
                code: "DC0001",
                params: { kind: "previous-declaration", name: item.name },
                span: previous.span,
                severity: "note",
              }),
            ],
          }),
        );
        return;
      }

      const declaration: Declaration = Object.freeze({
        id: declarations.length,
        module: node.id,
        name: item.name,
        kind: item.kind,
        visibility: item.visibility,
        span: item.span,
      });
      declarations.push(declaration);
      table.add(declaration);
    });
  });

  return { declarations, tables, diagnostics };
};
