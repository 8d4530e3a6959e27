import type { SccGraph } from "@scc-kit/core";
import { createComponents, type Components } from "./components.js";
import { runTarjanScc } from "./tarjan.js";

/**
 * Computes the strongly connected components of `graph` in linear time
 * (Tarjan), together with the condensation edges between them.
 */
export const stronglyConnectedComponents = <V>(graph: SccGraph<V>): Components<V> =>
  createComponents(runTarjanScc(graph));
