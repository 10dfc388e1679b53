import type { Edge, Graph, GraphColoringInstance, GraphFamily, RandomSource } from '../../types/problem';
import { rngChoice, rngInt, rngSample } from '../../utils/random';
import { solveChromaticNumber, solveGreedyColoring } from './algorithms';

export const MIN_VERTICES = 4;
export const MAX_VERTICES = 7;

const GRAPH_FAMILIES: readonly GraphFamily[] = ['complete', 'cycle', 'bipartite', 'random'];
const SPARSE_FAMILIES: readonly GraphFamily[] = ['cycle', 'bipartite', 'random'];

const normalizeEdges = (edges: Iterable<Edge>): Edge[] => {
  const unique = new Map<string, Edge>();
  for (const [a, b] of edges) {
    if (a === b) {
      continue;
    }
    const edge: Edge = a < b ? [a, b] : [b, a];
    unique.set(`${edge[0]}-${edge[1]}`, edge);
  }
  return [...unique.values()].sort((x, y) => x[0] - y[0] || x[1] - y[1]);
};

const allPairs = (vertexCount: number): Edge[] => {
  const pairs: Edge[] = [];
  for (let u = 0; u < vertexCount; u += 1) {
    for (let v = u + 1; v < vertexCount; v += 1) {
      pairs.push([u, v]);
    }
  }
  return pairs;
};

export const completeGraph = (vertexCount: number): Graph => ({
  vertexCount,
  edges: allPairs(vertexCount),
});

export const cycleGraph = (vertexCount: number): Graph => ({
  vertexCount,
  edges: normalizeEdges(
    Array.from({ length: vertexCount }, (_, vertex): Edge => [vertex, (vertex + 1) % vertexCount]),
  ),
});

/** Two sides with every left vertex joined to at least one right vertex. */
export const generateBipartiteGraph = (rng: RandomSource, vertexCount: number): Graph => {
  const leftSize = rngInt(rng, 2, Math.floor(vertexCount / 2) + 1);
  const right = Array.from({ length: vertexCount - leftSize }, (_, index) => leftSize + index);
  const edges: Edge[] = [];

  for (let left = 0; left < leftSize; left += 1) {
    edges.push([left, rngChoice(rng, right)]);
    right.forEach((vertex) => {
      if (rng() < 0.3) {
        edges.push([left, vertex]);
      }
    });
  }

  return { vertexCount, edges: normalizeEdges(edges) };
};

/** Uniform edge sample with between n - 1 and n(n - 1) / 3 edges. */
export const generateRandomGraph = (rng: RandomSource, vertexCount: number): Graph => {
  const minEdges = vertexCount - 1;
  const maxEdges = Math.max(minEdges, Math.floor((vertexCount * (vertexCount - 1)) / 3));
  const edgeCount = rngInt(rng, minEdges, maxEdges);

  return {
    vertexCount,
    edges: normalizeEdges(rngSample(rng, allPairs(vertexCount), edgeCount)),
  };
};

const buildGraph = (rng: RandomSource, family: GraphFamily, vertexCount: number): Graph => {
  switch (family) {
    case 'complete':
      return completeGraph(vertexCount);
    case 'cycle':
      return cycleGraph(vertexCount);
    case 'bipartite':
      return generateBipartiteGraph(rng, vertexCount);
    case 'random':
      return generateRandomGraph(rng, vertexCount);
  }
};

const knownChromaticNumber = (family: GraphFamily, graph: Graph): number => {
  switch (family) {
    case 'complete':
      return graph.vertexCount;
    case 'cycle':
      return graph.vertexCount % 2 === 0 ? 2 : 3;
    case 'bipartite':
      return graph.edges.length > 0 ? 2 : 1;
    case 'random':
      return solveChromaticNumber(graph).chromaticNumber;
  }
};

export interface GraphInstanceOptions {
  family?: GraphFamily;
  minVertices?: number;
  maxVertices?: number;
}

/**
 * A structured graph with its chromatic number. The color budget leaves up to
 * one spare color above the optimum.
 */
export const generateGraphColoringInstance = (
  rng: RandomSource,
  { family, minVertices = MIN_VERTICES, maxVertices = MAX_VERTICES }: GraphInstanceOptions = {},
): GraphColoringInstance => {
  const chosenFamily = family ?? rngChoice(rng, GRAPH_FAMILIES);
  const graph = buildGraph(rng, chosenFamily, rngInt(rng, minVertices, maxVertices));
  const chromaticNumber = knownChromaticNumber(chosenFamily, graph);
  return {
    topic: 'graph-coloring',
    graph,
    family: chosenFamily,
    chromaticNumber,
    colorBudget: chromaticNumber + rngInt(rng, 0, 1),
  };
};

/**
 * A graph plus a coloring to judge. Valid colorings come from the greedy
 * solver; invalid ones copy a neighbor's color onto one endpoint of an edge.
 */
export const generateColoringScenario = (rng: RandomSource, valid: boolean): GraphColoringInstance => {
  const instance = generateGraphColoringInstance(rng, { family: rngChoice(rng, SPARSE_FAMILIES) });
  const coloring = solveGreedyColoring(instance.graph);

  if (!valid) {
    const [u, v] = rngChoice(rng, instance.graph.edges);
    coloring[v] = coloring[u];
  }

  const colorsUsed = Math.max(...coloring) + 1;
  return {
    ...instance,
    colorBudget: Math.max(instance.colorBudget, colorsUsed),
    coloring,
  };
};
