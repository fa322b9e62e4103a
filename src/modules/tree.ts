import { diagnosticFromCode, type Diagnostic } from "../diagnostics/index.js";
import type { ModuleId } from "../semantics/ids.js";
import { ROOT_MODULE_NAME } from "./path.js";
import { getSccGroups } from "./scc.js";
import type {
  ModuleNode,
  ModuleTree,
  SourceModDecl,
  SourceModule,
  SourceUnit,
} from "./types.js";
import { isIdentifier, isPathKeyword } from "./use-path.js";

type MutableModuleNode = Omit<ModuleNode, "children"> & {
  children: Map<string, ModuleId>;
};

const emptyModule = (key: string): SourceModule => ({
  key,
  file: "<unknown>",
  mods: [],
  items: [],
  uses: [],
  references: [],
});

/**
 * Arranges the unit's modules into a tree rooted at `unit.root` following
 * `mod` declarations. Nodes are numbered breadth-first; the root is 0.
 */
export const buildModuleTree = (unit: SourceUnit): ModuleTree => {
  const diagnostics: Diagnostic[] = [];
  const sourcesByKey = new Map<string, SourceModule>();
  unit.modules.forEach((source) => {
    if (sourcesByKey.has(source.key)) {
      throw new Error(`module key ${source.key} appears more than once in the unit`);
    }
    sourcesByKey.set(source.key, source);
  });

  const cycleGroupByKey = reportModCycles({ unit, sourcesByKey, diagnostics });

  let rootSource = sourcesByKey.get(unit.root);
  if (!rootSource) {
    rootSource = emptyModule(unit.root);
    diagnostics.push(
      diagnosticFromCode({
        code: "MT0003",
        params: { kind: "missing-root", root: unit.root },
        span: { file: rootSource.file, start: 0, end: 0 },
      }),
    );
  }

  const nodes: MutableModuleNode[] = [
    {
      id: 0,
      key: rootSource.key,
      name: ROOT_MODULE_NAME,
      depth: 0,
      children: new Map(),
      source: rootSource,
      declaredAt: { file: rootSource.file, start: 0, end: 0 },
    },
  ];
  const byKey = new Map<string, ModuleId>([[rootSource.key, 0]]);

  const isAncestorOrSelf = (ancestor: ModuleId, module: ModuleId): boolean => {
    let current: ModuleId | undefined = module;
    while (current !== undefined) {
      if (current === ancestor) return true;
      current = nodes[current]?.parent;
    }
    return false;
  };

  const sameCycle = (left: string, right: string): boolean => {
    const group = cycleGroupByKey.get(left);
    return group !== undefined && group === cycleGroupByKey.get(right);
  };

  for (let index = 0; index < nodes.length; index += 1) {
    const node = nodes[index];
    node.source.mods.forEach((decl) => {
      if (!isIdentifier(decl.name)) {
        diagnostics.push(
          diagnosticFromCode({
            code: "MT0006",
            params: {
              kind: isPathKeyword(decl.name) ? "reserved-module-name" : "invalid-module-name",
              name: decl.name,
            },
            span: decl.span,
          }),
        );
        return;
      }

      const target = sourcesByKey.get(decl.module);
      if (!target) {
        diagnostics.push(
          diagnosticFromCode({
            code: "MT0003",
            params: { kind: "missing-module", name: decl.name, target: decl.module },
            span: decl.span,
          }),
        );
        return;
      }

      const sibling = node.children.get(decl.name);
      if (sibling !== undefined) {
        diagnostics.push(
          diagnosticFromCode({
            code: "MT0001",
            params: { kind: "duplicate-module", name: decl.name, parent: node.key },
            span: decl.span,
            related: [
              diagnosticFromCode({
                code: "MT0001",
                params: { kind: "previous-module", name: decl.name },
                span: nodes[sibling].declaredAt,
                severity: "note",
              }),
            ],
          }),
        );
        return;
      }

      const existing = byKey.get(target.key);
      if (existing !== undefined) {
        if (isAncestorOrSelf(existing, node.id) || sameCycle(node.key, target.key)) {
          return;
        }
        const previousParent = nodes[existing].parent;
        diagnostics.push(
          diagnosticFromCode({
            code: "MT0004",
            params: { kind: "module-declared-twice", target: target.key, parent: node.key },
            span: decl.span,
            related: [
              diagnosticFromCode({
                code: "MT0004",
                params: {
                  kind: "previous-parent",
                  parent:
                    previousParent === undefined ? ROOT_MODULE_NAME : nodes[previousParent].key,
                },
                span: nodes[existing].declaredAt,
                severity: "note",
              }),
            ],
          }),
        );
        return;
      }

      const id = nodes.length;
      nodes.push({
        id,
        key: target.key,
        name: decl.name,
        parent: node.id,
        depth: node.depth + 1,
        children: new Map(),
        source: target,
        declaredAt: decl.span,
      });
      node.children.set(decl.name, id);
      byKey.set(target.key, id);
    });
  }

  unit.modules.forEach((source) => {
    if (byKey.has(source.key)) return;
    diagnostics.push(
      diagnosticFromCode({
        code: "MT0005",
        params: { kind: "unreachable-module", target: source.key },
        span: { file: source.file, start: 0, end: 0 },
      }),
    );
  });

  return { root: 0, modules: nodes, byKey, diagnostics };
};

/** Reports each cyclic group of `mod` edges once and returns key -> group index. */
const reportModCycles = ({
  unit,
  sourcesByKey,
  diagnostics,
}: {
  unit: SourceUnit;
  sourcesByKey: ReadonlyMap<string, SourceModule>;
  diagnostics: Diagnostic[];
}): Map<string, number> => {
  const groups = getSccGroups({
    nodes: unit.modules.map((source) => source.key),
    edgesOf: (key) =>
      (sourcesByKey.get(key)?.mods ?? [])
        .map((decl) => decl.module)
        .filter((target) => sourcesByKey.has(target)),
  });

  const groupByKey = new Map<string, number>();
  groups
    .filter((group) => group.cyclic)
    .forEach((group, groupIndex) => {
      const members = new Set(group.members);
      group.members.forEach((key) => groupByKey.set(key, groupIndex));
      const closingDecl = group.members
        .flatMap((key) => sourcesByKey.get(key)?.mods ?? [])
        .find((decl: SourceModDecl) => members.has(decl.module));
      diagnostics.push(
        diagnosticFromCode({
          code: "MT0002",
          params: { kind: "cyclic-module-graph", cycle: group.members },
          span: closingDecl?.span ?? {
            file: sourcesByKey.get(group.members[0])?.file ?? "<unknown>",
            start: 0,
            end: 0,
          },
        }),
      );
    });

  return groupByKey;
};
