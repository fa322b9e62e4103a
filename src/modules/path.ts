import type { ModuleId } from "../semantics/ids.js";
import type { ModuleNode, ModuleTree } from "./types.js";
import type { PathAnchor } from "./use-path.js";

export const ROOT_MODULE_NAME = "crate";

export const getModule = (tree: ModuleTree, id: ModuleId): ModuleNode => {
  const node = tree.modules[id];
  if (!node) {
    throw new Error(`unknown module id ${id}`);
  }
  return node;
};

/** Segments from the root down to `id`; empty for the root itself. */
export const modulePathSegments = (tree: ModuleTree, id: ModuleId): string[] => {
  const segments: string[] = [];
  let current: ModuleNode | undefined = getModule(tree, id);
  while (current && current.parent !== undefined) {
    segments.unshift(current.name);
    current = tree.modules[current.parent];
  }
  return segments;
};

export const modulePathToString = (tree: ModuleTree, id: ModuleId): string =>
  [ROOT_MODULE_NAME, ...modulePathSegments(tree, id)].join("::");

export const isAncestorOrSelf = ({
  tree,
  ancestor,
  module,
}: {
  tree: ModuleTree;
  ancestor: ModuleId;
  module: ModuleId;
}): boolean => {
  let current: ModuleId | undefined = module;
  while (current !== undefined) {
    if (current === ancestor) return true;
    current = getModule(tree, current).parent;
  }
  return false;
};

export type ModulePrefixResolution =
  | { kind: "found"; module: ModuleId }
  | { kind: "unknown-module"; segment: string; module: ModuleId };

/**
 * Walks the module segments of a path. Implicit paths start at a child of
 * `from` and, when `rootFallback` is set, at a child of the root.
 */
export const resolveModulePrefix = ({
  tree,
  from,
  anchor,
  segments,
  rootFallback,
}: {
  tree: ModuleTree;
  from: ModuleId;
  anchor: PathAnchor;
  segments: readonly string[];
  rootFallback: boolean;
}): ModulePrefixResolution => {
  const start = anchorStart({ tree, from, anchor, first: segments[0], rootFallback });
  if (start.kind === "unknown-module") {
    return start;
  }

  let current = start.module;
  for (const segment of segments) {
    const child = getModule(tree, current).children.get(segment);
    if (child === undefined) {
      return { kind: "unknown-module", segment, module: current };
    }
    current = child;
  }
  return { kind: "found", module: current };
};

const anchorStart = ({
  tree,
  from,
  anchor,
  first,
  rootFallback,
}: {
  tree: ModuleTree;
  from: ModuleId;
  anchor: PathAnchor;
  first?: string;
  rootFallback: boolean;
}): ModulePrefixResolution => {
  switch (anchor.kind) {
    case "crate":
      return { kind: "found", module: tree.root };
    case "self":
      return { kind: "found", module: from };
    case "super": {
      let current = from;
      for (let hop = 0; hop < anchor.hops; hop += 1) {
        const parent = getModule(tree, current).parent;
        if (parent === undefined) {
          return { kind: "unknown-module", segment: "super", module: current };
        }
        current = parent;
      }
      return { kind: "found", module: current };
    }
    case "implicit": {
      if (first === undefined || getModule(tree, from).children.has(first)) {
        return { kind: "found", module: from };
      }
      if (rootFallback && getModule(tree, tree.root).children.has(first)) {
        return { kind: "found", module: tree.root };
      }
      return { kind: "unknown-module", segment: first, module: from };
    }
  }
};

const lowestCommonAncestor = (
  tree: ModuleTree,
  left: ModuleId,
  right: ModuleId,
): ModuleId => {
  let current: ModuleId | undefined = left;
  while (current !== undefined) {
    if (isAncestorOrSelf({ tree, ancestor: current, module: right })) {
      return current;
    }
    current = getModule(tree, current).parent;
  }
  return tree.root;
};

/**
 * Renders a path to `name` inside `to` as seen from `from`, climbing with
 * `super::` to the closest common ancestor and anchoring with `self::` when
 * no climb is needed.
 */
export const relativePathBetween = ({
  tree,
  from,
  to,
  name,
}: {
  tree: ModuleTree;
  from: ModuleId;
  to: ModuleId;
  name: string;
}): string => {
  const ancestor = lowestCommonAncestor(tree, from, to);
  const hops = getModule(tree, from).depth - getModule(tree, ancestor).depth;
  const descent = modulePathSegments(tree, to).slice(
    modulePathSegments(tree, ancestor).length,
  );
  const prefix = hops === 0 ? "self::" : "super::".repeat(hops);
  return `${prefix}${[...descent, name].join("::")}`;
};
