import type { Graph } from '../../types/problem';

export type ColoringCheck =
  | { valid: true }
  | { valid: false; reason: 'uncolored-vertex'; vertex: number }
  | { valid: false; reason: 'adjacent-same-color'; u: number; v: number; color: number };

export const buildAdjacency = (graph: Graph): Set<number>[] => {
  const adjacency = Array.from({ length: graph.vertexCount }, () => new Set<number>());
  graph.edges.forEach(([u, v]) => {
    adjacency[u].add(v);
    adjacency[v].add(u);
  });
  return adjacency;
};

const isColored = (color: number | undefined): color is number =>
  typeof color === 'number' && Number.isInteger(color) && color >= 0;

export const checkColoring = (graph: Graph, coloring: readonly number[]): ColoringCheck => {
  for (let vertex = 0; vertex < graph.vertexCount; vertex += 1) {
    if (!isColored(coloring[vertex])) {
      return { valid: false, reason: 'uncolored-vertex', vertex };
    }
  }

  for (const [u, v] of graph.edges) {
    if (coloring[u] === coloring[v]) {
      return { valid: false, reason: 'adjacent-same-color', u, v, color: coloring[u] };
    }
  }

  return { valid: true };
};

export const isValidColoring = (graph: Graph, coloring: readonly number[]): boolean =>
  checkColoring(graph, coloring).valid;

export const countColors = (coloring: readonly number[]): number => new Set(coloring).size;

const smallestFreeColor = (neighbors: Iterable<number>, coloring: readonly number[]): number => {
  const taken = new Set<number>();
  for (const neighbor of neighbors) {
    if (coloring[neighbor] >= 0) {
      taken.add(coloring[neighbor]);
    }
  }

  let color = 0;
  while (taken.has(color)) {
    color += 1;
  }
  return color;
};

/** Vertices in index order, each given the smallest color its colored neighbors leave free. */
export const solveGreedyColoring = (graph: Graph): number[] => {
  const adjacency = buildAdjacency(graph);
  const coloring = new Array<number>(graph.vertexCount).fill(-1);

  for (let vertex = 0; vertex < graph.vertexCount; vertex += 1) {
    coloring[vertex] = smallestFreeColor(adjacency[vertex], coloring);
  }

  return coloring;
};

/**
 * Welsh-Powell: vertices by descending degree (index order among equals); each
 * pass opens a new color and gives it to every uncolored vertex with no
 * neighbor already holding it.
 */
export const solveWelshPowellColoring = (graph: Graph): number[] => {
  const adjacency = buildAdjacency(graph);
  const order = Array.from({ length: graph.vertexCount }, (_, vertex) => vertex).sort(
    (a, b) => adjacency[b].size - adjacency[a].size,
  );
  const coloring = new Array<number>(graph.vertexCount).fill(-1);
  let color = 0;

  while (coloring.some((value) => value < 0)) {
    for (const vertex of order) {
      if (coloring[vertex] >= 0) {
        continue;
      }
      const clashes = [...adjacency[vertex]].some((neighbor) => coloring[neighbor] === color);
      if (!clashes) {
        coloring[vertex] = color;
      }
    }
    color += 1;
  }

  return coloring;
};

const colorWithBudget = (adjacency: readonly Set<number>[], colors: number): number[] | null => {
  const coloring = new Array<number>(adjacency.length).fill(-1);

  const assign = (vertex: number): boolean => {
    if (vertex === adjacency.length) {
      return true;
    }

    for (let color = 0; color < colors; color += 1) {
      const clashes = [...adjacency[vertex]].some((neighbor) => coloring[neighbor] === color);
      if (!clashes) {
        coloring[vertex] = color;
        if (assign(vertex + 1)) {
          return true;
        }
        coloring[vertex] = -1;
      }
    }
    return false;
  };

  return assign(0) ? coloring : null;
};

export interface ChromaticSolution {
  chromaticNumber: number;
  coloring: number[];
}

/** Tries m = 1, 2, ... colors by backtracking until one succeeds. */
export const solveChromaticNumber = (graph: Graph): ChromaticSolution => {
  if (graph.vertexCount === 0) {
    return { chromaticNumber: 0, coloring: [] };
  }

  const adjacency = buildAdjacency(graph);
  for (let colors = 1; colors <= graph.vertexCount; colors += 1) {
    const coloring = colorWithBudget(adjacency, colors);
    if (coloring) {
      return { chromaticNumber: colors, coloring };
    }
  }

  // unreachable: n colors always suffice for n vertices
  throw new Error(`Could not color a graph with ${graph.vertexCount} vertices`);
};
