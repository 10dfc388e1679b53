import { describe, expect, it } from 'vitest';
import { seededRng } from '../../utils/random';
import { isLegalNextSquare, isLShapeMove } from './algorithms';
import { generateNextMoveScenario, generateTourInstance } from './generators';

describe('generateTourInstance', () => {
  it('picks a solvable square board starting in the corner', () => {
    const rng = seededRng(3);
    for (let i = 0; i < 10; i += 1) {
      const instance = generateTourInstance(rng);
      expect([5, 6]).toContain(instance.rows);
      expect(instance.cols).toBe(instance.rows);
      expect(instance.start).toEqual([0, 0]);
    }
  });
});

describe('generateNextMoveScenario', () => {
  it('builds a knight path and a next square of the requested legality', () => {
    const rng = seededRng(10);
    for (let i = 0; i < 30; i += 1) {
      const legal = i % 2 === 1;
      const instance = generateNextMoveScenario(rng, legal);
      const path = instance.path ?? [];
      const board = { rows: instance.rows, cols: instance.cols };

      expect(path.length).toBeGreaterThanOrEqual(1);
      for (let index = 1; index < path.length; index += 1) {
        const [r1, c1] = path[index - 1];
        const [r2, c2] = path[index];
        expect(isLShapeMove(r1, c1, r2, c2)).toBe(true);
      }
      expect(instance.nextSquare).toBeDefined();
      if (instance.nextSquare) {
        expect(isLegalNextSquare(board, path, instance.nextSquare)).toBe(legal);
      }
    }
  });
});
