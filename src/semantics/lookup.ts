import { isAncestorOrSelf } from "../modules/path.js";
import type { ItemKind, ModuleTree, Visibility } from "../modules/types.js";
import type { Declaration } from "./declarations.js";
import type { ModuleId } from "./ids.js";

export type LookupOutcome =
  | { kind: "unique"; declaration: Declaration }
  | { kind: "ambiguous"; candidates: readonly Declaration[] }
  | { kind: "not-found" };

export const toLookupOutcome = (
  candidates: readonly Declaration[],
): LookupOutcome => {
  const unique = Array.from(
    new Map(candidates.map((candidate) => [candidate.id, candidate])).values(),
  );
  const [first] = unique;
  if (!first) return { kind: "not-found" };
  if (unique.length === 1) return { kind: "unique", declaration: first };
  return { kind: "ambiguous", candidates: unique };
};

export const filterKinds = (
  declarations: readonly Declaration[],
  kinds?: readonly ItemKind[],
): readonly Declaration[] =>
  kinds && kinds.length > 0
    ? declarations.filter((declaration) => kinds.includes(declaration.kind))
    : declarations;

/** Private names are visible in their owning module and its descendants. */
export const isVisibleFrom = ({
  tree,
  owner,
  visibility,
  from,
}: {
  tree: ModuleTree;
  owner: ModuleId;
  visibility: Visibility;
  from: ModuleId;
}): boolean =>
  visibility === "pub" || isAncestorOrSelf({ tree, ancestor: owner, module: from });

export const isDeclarationVisibleFrom = ({
  tree,
  declaration,
  from,
}: {
  tree: ModuleTree;
  declaration: Declaration;
  from: ModuleId;
}): boolean =>
  isVisibleFrom({
    tree,
    owner: declaration.module,
    visibility: declaration.visibility,
    from,
  });
