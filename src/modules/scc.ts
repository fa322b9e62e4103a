export type SccGroup<T> = {
  members: readonly T[];
  cyclic: boolean;
};

/**
 * Tarjan's algorithm over an arbitrary graph. Groups come out dependencies
 * first; members keep the order of `nodes`.
 */
export const getSccGroups = <T>({
  nodes,
  edgesOf,
}: {
  nodes: readonly T[];
  edgesOf: (node: T) => readonly T[];
}): SccGroup<T>[] => {
  const nodeOrder = new Map(nodes.map((node, index) => [node, index]));
  const edgesByNode = new Map(
    nodes.map((node) => [
      node,
      Array.from(new Set(edgesOf(node))).filter((target) =>
        nodeOrder.has(target),
      ),
    ]),
  );

  let index = 0;
  const stack: T[] = [];
  const onStack = new Set<T>();
  const indexByNode = new Map<T, number>();
  const lowlinkByNode = new Map<T, number>();
  const groups: T[][] = [];

  const visit = (node: T) => {
    indexByNode.set(node, index);
    lowlinkByNode.set(node, index);
    index += 1;
    stack.push(node);
    onStack.add(node);

    const targets = edgesByNode.get(node) ?? [];
    targets.forEach((target) => {
      if (!indexByNode.has(target)) {
        visit(target);
        const nodeLowlink = lowlinkByNode.get(node);
        const targetLowlink = lowlinkByNode.get(target);
        if (typeof nodeLowlink === "number" && typeof targetLowlink === "number") {
          lowlinkByNode.set(node, Math.min(nodeLowlink, targetLowlink));
        }
        return;
      }

      if (!onStack.has(target)) {
        return;
      }

      const nodeLowlink = lowlinkByNode.get(node);
      const targetIndex = indexByNode.get(target);
      if (typeof nodeLowlink === "number" && typeof targetIndex === "number") {
        lowlinkByNode.set(node, Math.min(nodeLowlink, targetIndex));
      }
    });

    if (lowlinkByNode.get(node) !== indexByNode.get(node)) {
      return;
    }

    const component: T[] = [];
    while (stack.length > 0) {
      const member = stack.pop();
      if (member === undefined) break;
      onStack.delete(member);
      component.push(member);
      if (member === node) {
        break;
      }
    }

    component.sort(
      (left, right) => (nodeOrder.get(left) ?? 0) - (nodeOrder.get(right) ?? 0),
    );
    groups.push(component);
  };

  nodes.forEach((node) => {
    if (indexByNode.has(node)) {
      return;
    }
    visit(node);
  });

  return groups.map((group) => ({
    members: group,
    cyclic: isCyclicGroup({ group, edgesByNode }),
  }));
};

const isCyclicGroup = <T>({
  group,
  edgesByNode,
}: {
  group: readonly T[];
  edgesByNode: ReadonlyMap<T, readonly T[]>;
}): boolean => {
  if (group.length > 1) {
    return true;
  }
  const [node] = group;
  if (node === undefined) {
    return false;
  }
  return (edgesByNode.get(node) ?? []).includes(node);
};
