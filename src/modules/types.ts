import type { Diagnostic, SourceSpan } from "../diagnostics/index.js";
import type { ModuleId } from "../semantics/ids.js";

export const ITEM_KINDS = [
  "struct",
  "enum",
  "function",
  "type-alias",
  "trait",
  "const",
] as const;

export type ItemKind = (typeof ITEM_KINDS)[number];

export type Visibility = "pub" | "private";

export interface SourceItem {
  name: string;
  kind: ItemKind;
  visibility: Visibility;
  span: SourceSpan;
}

/** A `mod name;` declaration pointing at another module of the unit by key. */
export interface SourceModDecl {
  name: string;
  module: string;
  span: SourceSpan;
}

export interface SourceUse {
  /** Use tree text, e.g. `another_lib::{Foo, Bar as Baz}`. */
  path: string;
  visibility: Visibility;
  span: SourceSpan;
}

/** An identifier occurrence later phases need resolved. */
export interface SourceReference {
  path: string;
  span: SourceSpan;
  kinds?: readonly ItemKind[];
}

export interface SourceModule {
  /** Unique within the unit. */
  key: string;
  file: string;
  mods: readonly SourceModDecl[];
  items: readonly SourceItem[];
  uses: readonly SourceUse[];
  references: readonly SourceReference[];
}

/** Parser output for one compilation unit: a flat module list plus its root. */
export interface SourceUnit {
  root: string;
  modules: readonly SourceModule[];
}

export interface ModuleNode {
  id: ModuleId;
  key: string;
  /** `crate` for the root, otherwise the name its parent declared it under. */
  name: string;
  parent?: ModuleId;
  depth: number;
  children: ReadonlyMap<string, ModuleId>;
  source: SourceModule;
  /** Span of the declaring `mod`; the file start for the root. */
  declaredAt: SourceSpan;
}

export interface ModuleTree {
  root: ModuleId;
  modules: readonly ModuleNode[];
  byKey: ReadonlyMap<string, ModuleId>;
  diagnostics: readonly Diagnostic[];
}
