import { describe, expect, it } from 'vitest';
import { seededRng } from '../../utils/random';
import {
  checkColoring,
  countColors,
  isValidColoring,
  solveChromaticNumber,
  solveGreedyColoring,
  solveWelshPowellColoring,
} from './algorithms';
import {
  completeGraph,
  cycleGraph,
  generateColoringScenario,
  generateGraphColoringInstance,
  MAX_VERTICES,
  MIN_VERTICES,
} from './generators';

describe('graph builders', () => {
  it('builds complete graphs and cycles', () => {
    expect(completeGraph(4).edges).toHaveLength(6);
    expect(cycleGraph(4).edges).toEqual([
      [0, 1],
      [0, 3],
      [1, 2],
      [2, 3],
    ]);
  });
});

describe('generateGraphColoringInstance', () => {
  it('produces simple graphs within the size bounds', () => {
    const rng = seededRng(3);
    for (let i = 0; i < 40; i += 1) {
      const { graph } = generateGraphColoringInstance(rng);
      expect(graph.vertexCount).toBeGreaterThanOrEqual(MIN_VERTICES);
      expect(graph.vertexCount).toBeLessThanOrEqual(MAX_VERTICES);

      const keys = graph.edges.map(([u, v]) => `${u}-${v}`);
      expect(new Set(keys).size).toBe(keys.length);
      graph.edges.forEach(([u, v]) => {
        expect(u).toBeLessThan(v);
        expect(v).toBeLessThan(graph.vertexCount);
      });
    }
  });

  it('records the true chromatic number for every family', () => {
    const rng = seededRng(5);
    for (const family of ['complete', 'cycle', 'bipartite', 'random'] as const) {
      for (let i = 0; i < 10; i += 1) {
        const instance = generateGraphColoringInstance(rng, { family });
        expect(instance.family).toBe(family);
        expect(instance.chromaticNumber).toBe(solveChromaticNumber(instance.graph).chromaticNumber);
        expect(instance.colorBudget - (instance.chromaticNumber ?? 0)).toBeGreaterThanOrEqual(0);
        expect(instance.colorBudget - (instance.chromaticNumber ?? 0)).toBeLessThanOrEqual(1);
      }
    }
  });

  it('greedy and Welsh-Powell color every generated graph properly', () => {
    const rng = seededRng(8);
    for (let i = 0; i < 60; i += 1) {
      const { graph, chromaticNumber } = generateGraphColoringInstance(rng);
      const greedy = solveGreedyColoring(graph);
      const welshPowell = solveWelshPowellColoring(graph);

      expect(isValidColoring(graph, greedy)).toBe(true);
      expect(isValidColoring(graph, welshPowell)).toBe(true);
      expect(countColors(welshPowell)).toBeGreaterThanOrEqual(chromaticNumber ?? 0);
    }
  });
});

describe('generateColoringScenario', () => {
  it('produces colorings whose validity matches the request', () => {
    const rng = seededRng(21);
    for (let i = 0; i < 20; i += 1) {
      const valid = generateColoringScenario(rng, true);
      expect(isValidColoring(valid.graph, valid.coloring ?? [])).toBe(true);

      const invalid = generateColoringScenario(rng, false);
      const check = checkColoring(invalid.graph, invalid.coloring ?? []);
      expect(check.valid).toBe(false);
      if (!check.valid) {
        expect(check.reason).toBe('adjacent-same-color');
      }
    }
  });
});
