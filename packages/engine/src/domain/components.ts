import { longestPathDepths } from "./depths.js";
import type { TarjanResult } from "./tarjan.js";

/**
 * Strongly connected components of a graph and the condensation graph over
 * them.
 *
 * Component indices follow completion order: every component reachable from
 * component `i` has an index lower than `i`. Queries taking an index return
 * `undefined` when it does not name a component.
 */
export type Components<V> = {
  readonly size: number;
  isEmpty: () => boolean;
  iter: () => IterableIterator<readonly V[]>;
  [Symbol.iterator]: () => IterableIterator<readonly V[]>;
  vertexComponentIndex: (vertex: V) => number | undefined;
  getByIndex: (index: number) => readonly V[] | undefined;
  get: (vertex: V) => readonly V[] | undefined;
  successors: (index: number) => readonly number[] | undefined;
  isCyclic: (index: number) => boolean | undefined;
  directSuccessors: (index: number) => ReadonlySet<number> | undefined;
  predecessors: () => ReadonlySet<number>[];
  depths: () => number[];
  orderByDepth: () => number[];
};

export const createComponents = <V>(result: TarjanResult<V>): Components<V> => {
  const { components, componentByVertex, componentSuccessors } = result;

  const isIndex = (index: number): boolean =>
    Number.isInteger(index) && index >= 0 && index < components.length;

  const successorSet = (index: number): ReadonlySet<number> | undefined =>
    isIndex(index) ? componentSuccessors[index] : undefined;

  const iter = (): IterableIterator<readonly V[]> => components.values();

  const getByIndex = (index: number): readonly V[] | undefined => {
    const component = isIndex(index) ? components[index] : undefined;
    return component === undefined ? undefined : [...component];
  };

  const vertexComponentIndex = (vertex: V): number | undefined => componentByVertex.get(vertex);

  const successors = (index: number): readonly number[] | undefined => {
    const set = successorSet(index);
    return set === undefined ? undefined : [...set].sort((a, b) => a - b);
  };

  const isCyclic = (index: number): boolean | undefined => successorSet(index)?.has(index);

  const directSuccessors = (index: number): ReadonlySet<number> | undefined => {
    const outgoing = successorSet(index);
    if (outgoing === undefined) {
      return undefined;
    }

    const result = new Set(outgoing);
    result.delete(index);

    // Everything reachable from one successor is an indirect successor. The
    // visited set keeps each component expanded once, `index` included.
    const expanded = new Set<number>([index]);
    const pending: number[] = [...result];
    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined || expanded.has(current)) {
        continue;
      }
      expanded.add(current);

      for (const next of componentSuccessors[current] ?? []) {
        if (next === current) {
          continue;
        }

        result.delete(next);
        pending.push(next);
      }
    }

    return result;
  };

  const predecessors = (): ReadonlySet<number>[] => {
    const inverse = components.map(() => new Set<number>());

    componentSuccessors.forEach((targets, source) => {
      for (const target of targets) {
        inverse[target]?.add(source);
      }
    });

    return inverse;
  };

  const depths = (): number[] =>
    longestPathDepths(components.length, (index) => componentSuccessors[index] ?? []);

  const orderByDepth = (): number[] => {
    const depth = depths();
    return components
      .map((_, index) => index)
      .sort((a, b) => (depth[a] ?? 0) - (depth[b] ?? 0));
  };

  return {
    size: components.length,
    isEmpty: () => components.length === 0,
    iter,
    [Symbol.iterator]: iter,
    vertexComponentIndex,
    getByIndex,
    get: (vertex) => {
      const index = vertexComponentIndex(vertex);
      return index === undefined ? undefined : getByIndex(index);
    },
    successors,
    isCyclic,
    directSuccessors,
    predecessors,
    depths,
    orderByDepth,
  };
};
