import type { SccGraph } from "@scc-kit/core";

type DiscoveryRecord = {
  index: number;
  lowLink: number;
  onStack: boolean;
  component: number;
};

type Frame<V> = {
  vertex: V;
  record: DiscoveryRecord;
  successors: Iterator<V>;
  // Successor whose visit is in progress; its lowlink is folded in on return.
  pendingChild: DiscoveryRecord | undefined;
};

export type TarjanResult<V> = {
  components: readonly (readonly V[])[];
  componentByVertex: ReadonlyMap<V, number>;
  componentSuccessors: readonly ReadonlySet<number>[];
};

export const runTarjanScc = <V>(graph: SccGraph<V>): TarjanResult<V> => {
  let nextIndex = 0;
  const records = new Map<V, DiscoveryRecord>();
  const openStack: { vertex: V; record: DiscoveryRecord }[] = [];
  const components: V[][] = [];

  const open = (vertex: V): Frame<V> => {
    const record: DiscoveryRecord = {
      index: nextIndex,
      lowLink: nextIndex,
      onStack: true,
      component: -1,
    };
    records.set(vertex, record);
    nextIndex += 1;
    openStack.push({ vertex, record });

    return {
      vertex,
      record,
      successors: graph.successors(vertex)[Symbol.iterator](),
      pendingChild: undefined,
    };
  };

  const closeComponent = (root: DiscoveryRecord): void => {
    const componentIndex = components.length;
    const component: V[] = [];

    for (;;) {
      const popped = openStack.pop();
      if (popped === undefined) {
        break;
      }

      popped.record.onStack = false;
      popped.record.component = componentIndex;
      component.push(popped.vertex);
      if (popped.record === root) {
        break;
      }
    }

    components.push(component);
  };

  const strongConnect = (start: V): void => {
    const frames: Frame<V>[] = [open(start)];

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (frame === undefined) {
        break;
      }

      const { record } = frame;
      if (frame.pendingChild !== undefined) {
        if (frame.pendingChild.lowLink < record.lowLink) {
          record.lowLink = frame.pendingChild.lowLink;
        }
        frame.pendingChild = undefined;
      }

      const step = frame.successors.next();
      if (step.done !== true) {
        const next = step.value;
        const nextRecord = records.get(next);

        if (nextRecord === undefined) {
          const child = open(next);
          frame.pendingChild = child.record;
          frames.push(child);
          continue;
        }

        // Index, not lowlink: a back edge only proves reachability of that ancestor.
        if (nextRecord.onStack && nextRecord.index < record.lowLink) {
          record.lowLink = nextRecord.index;
        }
        continue;
      }

      frames.pop();
      if (record.lowLink === record.index) {
        closeComponent(record);
      }
    }
  };

  for (const vertex of graph.vertices()) {
    if (!records.has(vertex)) {
      strongConnect(vertex);
    }
  }

  const componentByVertex = new Map<V, number>();
  for (const [vertex, record] of records) {
    componentByVertex.set(vertex, record.component);
  }

  const componentSuccessors = components.map((component) => {
    const successors = new Set<number>();
    for (const vertex of component) {
      for (const next of graph.successors(vertex)) {
        const target = componentByVertex.get(next);
        if (target !== undefined) {
          successors.add(target);
        }
      }
    }
    return successors;
  });

  return {
    components,
    componentByVertex,
    componentSuccessors,
  };
};
