/**
 * Longest path, in edges, from any source node to each node of a DAG given as
 * outgoing adjacency. Self edges are skipped. Nodes left on a cycle are never
 * released from the queue and keep the depth reached before the cycle.
 */
export const longestPathDepths = (
  nodeCount: number,
  outgoingOf: (node: number) => Iterable<number>,
): number[] => {
  const outgoing: Set<number>[] = [];
  const inDegree: number[] = new Array<number>(nodeCount).fill(0);

  for (let node = 0; node < nodeCount; node += 1) {
    const targets = new Set<number>();
    for (const target of outgoingOf(node)) {
      if (target === node || !Number.isInteger(target) || target < 0 || target >= nodeCount) {
        continue;
      }

      if (!targets.has(target)) {
        targets.add(target);
        inDegree[target] = (inDegree[target] ?? 0) + 1;
      }
    }
    outgoing.push(targets);
  }

  const depth: number[] = new Array<number>(nodeCount).fill(0);
  const queue: number[] = [];
  for (let node = 0; node < nodeCount; node += 1) {
    if (inDegree[node] === 0) {
      queue.push(node);
    }
  }

  let cursor = 0;
  while (cursor < queue.length) {
    const node = queue[cursor];
    cursor += 1;

    if (node === undefined) {
      continue;
    }

    const currentDepth = depth[node] ?? 0;
    for (const next of outgoing[node] ?? []) {
      if (currentDepth + 1 > (depth[next] ?? 0)) {
        depth[next] = currentDepth + 1;
      }

      const remainingIncoming = (inDegree[next] ?? 0) - 1;
      inDegree[next] = remainingIncoming;
      if (remainingIncoming === 0) {
        queue.push(next);
      }
    }
  }

  return depth;
};

/**
 * Returns the depth of each component from a predecessor-indexed adjacency.
 *
 * The depth of a component is the maximum of the depth of its predecessors
 * plus 1. A component with no predecessors has depth 0. Given
 * `components.predecessors()` this agrees with `components.depths()`.
 */
export const computeDepths = (predecessors: readonly Iterable<number>[]): number[] => {
  const successors: number[][] = predecessors.map(() => []);

  predecessors.forEach((sources, target) => {
    for (const source of sources) {
      successors[source]?.push(target);
    }
  });

  return longestPathDepths(successors.length, (node) => successors[node] ?? []);
};
