import type { RandomSource, SearchResult } from '../../types/problem';
import { yieldToEventLoop } from '../../utils/raceAlgorithms';
import { shuffleInPlace } from '../../utils/random';

// A placement lists one row per column: placement[col] = row.

export interface QueenConflict {
  kind: 'row' | 'diagonal';
  columns: readonly [number, number];
  rows: readonly [number, number];
}

export const findQueenConflicts = (placement: readonly number[]): QueenConflict[] => {
  const conflicts: QueenConflict[] = [];

  for (let i = 0; i < placement.length; i += 1) {
    for (let j = i + 1; j < placement.length; j += 1) {
      const rowI = placement[i];
      const rowJ = placement[j];

      if (rowI === rowJ) {
        conflicts.push({ kind: 'row', columns: [i, j], rows: [rowI, rowJ] });
      } else if (Math.abs(rowI - rowJ) === Math.abs(i - j)) {
        conflicts.push({ kind: 'diagonal', columns: [i, j], rows: [rowI, rowJ] });
      }
    }
  }

  return conflicts;
};

export const isValidQueensPlacement = (n: number, placement: readonly number[]): boolean => {
  if (placement.length !== n) {
    return false;
  }

  if (!placement.every((row) => Number.isInteger(row) && row >= 0 && row < n)) {
    return false;
  }

  return findQueenConflicts(placement).length === 0;
};

const canPlace = (board: readonly number[], col: number, row: number): boolean => {
  for (let placed = 0; placed < col; placed += 1) {
    if (board[placed] === row || Math.abs(board[placed] - row) === col - placed) {
      return false;
    }
  }
  return true;
};

/** First placement found by column-wise backtracking, rows tried in ascending order. */
export const solveNQueensBacktracking = (n: number): SearchResult<number[]> => {
  const board = new Array<number>(n).fill(-1);

  const solve = (col: number): boolean => {
    if (col === n) {
      return true;
    }

    for (let row = 0; row < n; row += 1) {
      if (canPlace(board, col, row)) {
        board[col] = row;
        if (solve(col + 1)) {
          return true;
        }
      }
    }

    board[col] = -1;
    return false;
  };

  return solve(0) ? { status: 'found', value: board } : { status: 'not-found' };
};

interface EnumerateOptions {
  firstRow?: number;
  limit?: number;
  deadline?: number;
}

/** Returns false when the deadline passed before the enumeration finished. */
const enumerateSolutions = (
  n: number,
  found: number[][],
  { firstRow, limit = Number.POSITIVE_INFINITY, deadline = Number.POSITIVE_INFINITY }: EnumerateOptions,
): boolean => {
  const board = new Array<number>(n).fill(-1);
  let expired = false;

  const solve = (col: number): void => {
    if (col === n) {
      found.push([...board]);
      return;
    }

    if (Date.now() > deadline) {
      expired = true;
      return;
    }

    const rows = col === 0 && firstRow !== undefined ? [firstRow] : Array.from({ length: n }, (_, row) => row);

    for (const row of rows) {
      if (found.length >= limit || expired) {
        return;
      }
      if (canPlace(board, col, row)) {
        board[col] = row;
        solve(col + 1);
      }
    }
  };

  solve(0);
  return !expired;
};

export const findAllNQueensSolutions = (n: number): number[][] => {
  const solutions: number[][] = [];
  enumerateSolutions(n, solutions, {});
  return solutions;
};

export interface MultiStartOptions {
  maxSolutions: number;
  timeoutMs: number;
}

export interface MultiStartResult {
  solutions: number[][];
  timedOut: boolean;
}

/**
 * Splits the search by the first queen's row, one task per row, and gathers up
 * to `maxSolutions` placements. Tasks stop at the shared deadline; an empty
 * result with `timedOut` set means nothing was discovered in time, not that
 * the board is unsolvable.
 */
export const findNQueensSolutionsMultiStart = async (
  n: number,
  { maxSolutions, timeoutMs }: MultiStartOptions,
): Promise<MultiStartResult> => {
  const deadline = Date.now() + timeoutMs;

  const workers = Array.from({ length: n }, async (_, firstRow) => {
    await yieldToEventLoop();
    const local: number[][] = [];
    const completed = enumerateSolutions(n, local, { firstRow, limit: maxSolutions, deadline });
    return { local, completed };
  });

  const results = await Promise.all(workers);

  return {
    solutions: results.flatMap((result) => result.local).slice(0, maxSolutions),
    timedOut: results.some((result) => !result.completed),
  };
};

/** Number of attacking pairs, counting both shared rows and shared diagonals. */
export const countAttackingPairs = (placement: readonly number[]): number =>
  findQueenConflicts(placement).length;

const randomPermutation = (n: number, rng: RandomSource): number[] => {
  const rows = Array.from({ length: n }, (_, row) => row);
  shuffleInPlace(rng, rows);
  return rows;
};

/** Best single-column reassignment; the first strictly better neighbor wins ties. */
const bestNeighbor = (board: readonly number[]): { board: number[]; conflicts: number } => {
  const n = board.length;
  let best = [...board];
  let bestConflicts = countAttackingPairs(board);
  const candidate = [...board];

  for (let col = 0; col < n; col += 1) {
    const original = candidate[col];
    for (let row = 0; row < n; row += 1) {
      if (row === original) {
        continue;
      }
      candidate[col] = row;
      const conflicts = countAttackingPairs(candidate);
      if (conflicts < bestConflicts) {
        bestConflicts = conflicts;
        best = [...candidate];
      }
    }
    candidate[col] = original;
  }

  return { board: best, conflicts: bestConflicts };
};

export interface HillClimbingOptions {
  maxRestarts?: number;
}

/** Steepest-ascent hill climbing with random restarts. */
export const solveNQueensHillClimbing = (
  n: number,
  rng: RandomSource,
  { maxRestarts = 50 }: HillClimbingOptions = {},
): SearchResult<number[]> => {
  for (let attempt = 0; attempt < maxRestarts; attempt += 1) {
    let board = randomPermutation(n, rng);
    let conflicts = countAttackingPairs(board);

    for (;;) {
      if (conflicts === 0) {
        return { status: 'found', value: board };
      }

      const next = bestNeighbor(board);
      if (next.conflicts >= conflicts) {
        break;
      }
      board = next.board;
      conflicts = next.conflicts;
    }
  }

  return { status: 'gave-up', reason: `no solution after ${maxRestarts} restarts` };
};

export interface AnnealingOptions {
  initialTemperature?: number;
  coolingRate?: number;
  minTemperature?: number;
}

/** Simulated annealing over row swaps with geometric cooling. */
export const solveNQueensSimulatedAnnealing = (
  n: number,
  rng: RandomSource,
  { initialTemperature = 100, coolingRate = 0.995, minTemperature = 0.01 }: AnnealingOptions = {},
): SearchResult<number[]> => {
  let board = randomPermutation(n, rng);
  let conflicts = countAttackingPairs(board);
  let temperature = initialTemperature;

  while (temperature > minTemperature && conflicts > 0 && n > 1) {
    const first = Math.floor(rng() * n);
    let second = Math.floor(rng() * (n - 1));
    if (second >= first) {
      second += 1;
    }

    const candidate = [...board];
    [candidate[first], candidate[second]] = [candidate[second], candidate[first]];
    const candidateConflicts = countAttackingPairs(candidate);
    const delta = candidateConflicts - conflicts;

    if (delta <= 0 || rng() < Math.exp(-delta / temperature)) {
      board = candidate;
      conflicts = candidateConflicts;
    }

    temperature *= coolingRate;
  }

  return conflicts === 0
    ? { status: 'found', value: board }
    : { status: 'gave-up', reason: 'temperature floor reached' };
};
