import { describe, expect, it } from 'vitest';
import { seededRng } from '../../utils/random';
import {
  countAttackingPairs,
  findAllNQueensSolutions,
  findNQueensSolutionsMultiStart,
  findQueenConflicts,
  isValidQueensPlacement,
  solveNQueensBacktracking,
  solveNQueensHillClimbing,
  solveNQueensSimulatedAnnealing,
} from './algorithms';

describe('isValidQueensPlacement', () => {
  it('accepts the first 4x4 solution', () => {
    expect(isValidQueensPlacement(4, [1, 3, 0, 2])).toBe(true);
  });

  it('rejects wrong lengths and out-of-range rows', () => {
    expect(isValidQueensPlacement(4, [1, 3, 0])).toBe(false);
    expect(isValidQueensPlacement(4, [1, 3, 0, 4])).toBe(false);
    expect(isValidQueensPlacement(4, [1, 3, 0, -1])).toBe(false);
  });

  it('rejects row and diagonal clashes', () => {
    expect(isValidQueensPlacement(4, [1, 1, 3, 0])).toBe(false);
    expect(isValidQueensPlacement(4, [0, 1, 2, 3])).toBe(false);
  });

  it('does not mutate its input', () => {
    const placement = [1, 3, 0, 2];
    isValidQueensPlacement(4, placement);
    expect(placement).toEqual([1, 3, 0, 2]);
  });
});

describe('findQueenConflicts', () => {
  it('names every attacking pair with its kind', () => {
    expect(findQueenConflicts([0, 0, 2])).toEqual([
      { kind: 'row', columns: [0, 1], rows: [0, 0] },
      { kind: 'diagonal', columns: [0, 2], rows: [0, 2] },
    ]);
  });

  it('counts all pairs on the main diagonal', () => {
    expect(countAttackingPairs([0, 1, 2, 3])).toBe(6);
  });
});

describe('solveNQueensBacktracking', () => {
  it('returns a valid placement for every N from 4 to 8', () => {
    for (let n = 4; n <= 8; n += 1) {
      const result = solveNQueensBacktracking(n);
      expect(result.status).toBe('found');
      if (result.status === 'found') {
        expect(isValidQueensPlacement(n, result.value)).toBe(true);
      }
    }
  });

  it('finds [1,3,0,2] first on a 4x4 board', () => {
    expect(solveNQueensBacktracking(4)).toEqual({ status: 'found', value: [1, 3, 0, 2] });
  });

  it('reports not-found for boards without a solution', () => {
    expect(solveNQueensBacktracking(2)).toEqual({ status: 'not-found' });
    expect(solveNQueensBacktracking(3)).toEqual({ status: 'not-found' });
  });
});

describe('findAllNQueensSolutions', () => {
  it('enumerates the known solution counts', () => {
    expect(findAllNQueensSolutions(4)).toEqual([
      [1, 3, 0, 2],
      [2, 0, 3, 1],
    ]);
    expect(findAllNQueensSolutions(6)).toHaveLength(4);
    expect(findAllNQueensSolutions(8)).toHaveLength(92);
  });
});

describe('findNQueensSolutionsMultiStart', () => {
  it('collects solutions across first-row workers up to the cap', async () => {
    const result = await findNQueensSolutionsMultiStart(6, { maxSolutions: 10, timeoutMs: 5000 });

    expect(result.timedOut).toBe(false);
    expect(result.solutions).toHaveLength(4);
    result.solutions.forEach((solution) => expect(isValidQueensPlacement(6, solution)).toBe(true));
  });

  it('honours the solution cap', async () => {
    const result = await findNQueensSolutionsMultiStart(8, { maxSolutions: 3, timeoutMs: 5000 });
    expect(result.solutions).toHaveLength(3);
  });

  it('returns an empty set for unsolvable sizes without timing out', async () => {
    const result = await findNQueensSolutionsMultiStart(3, { maxSolutions: 4, timeoutMs: 5000 });
    expect(result).toEqual({ solutions: [], timedOut: false });
  });

  it('stops at the deadline and keeps only complete solutions', async () => {
    const result = await findNQueensSolutionsMultiStart(13, { maxSolutions: 100_000, timeoutMs: 1 });

    expect(result.timedOut).toBe(true);
    expect(result.solutions.length).toBeLessThan(73_712);
    result.solutions.forEach((solution) => expect(isValidQueensPlacement(13, solution)).toBe(true));
  });
});

describe('local search solvers', () => {
  it('hill climbing only ever reports a valid placement', () => {
    for (let seed = 1; seed <= 10; seed += 1) {
      const result = solveNQueensHillClimbing(6, seededRng(seed));
      if (result.status === 'found') {
        expect(isValidQueensPlacement(6, result.value)).toBe(true);
      } else {
        expect(result.status).toBe('gave-up');
      }
    }
  });

  it('hill climbing solves 4x4 with enough restarts', () => {
    const result = solveNQueensHillClimbing(4, seededRng(7), { maxRestarts: 200 });
    expect(result.status).toBe('found');
  });

  it('simulated annealing either finds a valid placement or gives up', () => {
    for (let seed = 1; seed <= 10; seed += 1) {
      const result = solveNQueensSimulatedAnnealing(8, seededRng(seed));
      if (result.status === 'found') {
        expect(isValidQueensPlacement(8, result.value)).toBe(true);
      } else {
        expect(result).toEqual({ status: 'gave-up', reason: 'temperature floor reached' });
      }
    }
  });
});
