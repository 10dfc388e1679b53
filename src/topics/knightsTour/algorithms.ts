import type { BoardSize, Position, RandomSource, SearchResult } from '../../types/problem';
import { rngChoice } from '../../utils/random';

export const KNIGHT_OFFSETS: readonly Position[] = [
  [-2, -1],
  [-2, 1],
  [-1, -2],
  [-1, 2],
  [1, -2],
  [1, 2],
  [2, -1],
  [2, 1],
];

export const isLShapeMove = (r1: number, c1: number, r2: number, c2: number): boolean => {
  const dr = Math.abs(r1 - r2);
  const dc = Math.abs(c1 - c2);
  return (dr === 2 && dc === 1) || (dr === 1 && dc === 2);
};

export const isOnBoard = ({ rows, cols }: BoardSize, [row, col]: Position): boolean =>
  Number.isInteger(row) && Number.isInteger(col) && row >= 0 && row < rows && col >= 0 && col < cols;

const squareKey = ([row, col]: Position): string => `${row},${col}`;

export type TourViolation =
  | { kind: 'wrong-length'; expected: number; actual: number }
  | { kind: 'off-board'; index: number; square: Position }
  | { kind: 'wrong-start'; expected: Position; actual: Position }
  | { kind: 'revisited'; index: number; square: Position }
  | { kind: 'illegal-move'; index: number; from: Position; to: Position };

/**
 * First rule a full tour breaks, checked in this order: length, board bounds,
 * start square, then step by step for repeats and non-knight moves.
 */
export const findTourViolation = (
  board: BoardSize,
  path: readonly Position[],
  start?: Position,
): TourViolation | null => {
  const expected = board.rows * board.cols;
  if (path.length !== expected) {
    return { kind: 'wrong-length', expected, actual: path.length };
  }

  const offBoard = path.findIndex((square) => !isOnBoard(board, square));
  if (offBoard >= 0) {
    return { kind: 'off-board', index: offBoard, square: path[offBoard] };
  }

  if (start && squareKey(path[0]) !== squareKey(start)) {
    return { kind: 'wrong-start', expected: start, actual: path[0] };
  }

  const seen = new Set<string>();
  for (let index = 0; index < path.length; index += 1) {
    const square = path[index];
    const key = squareKey(square);
    if (seen.has(key)) {
      return { kind: 'revisited', index, square };
    }
    seen.add(key);

    if (index > 0) {
      const from = path[index - 1];
      if (!isLShapeMove(from[0], from[1], square[0], square[1])) {
        return { kind: 'illegal-move', index, from, to: square };
      }
    }
  }

  return null;
};

export const isValidKnightsTour = (board: BoardSize, path: readonly Position[]): boolean =>
  findTourViolation(board, path) === null;

/** Whether `next` extends a partial path: on the board, unvisited, one knight move away. */
export const isLegalNextSquare = (board: BoardSize, path: readonly Position[], next: Position): boolean => {
  if (!isOnBoard(board, next)) {
    return false;
  }
  if (path.some((square) => squareKey(square) === squareKey(next))) {
    return false;
  }
  const last = path[path.length - 1];
  return last === undefined || isLShapeMove(last[0], last[1], next[0], next[1]);
};

const legalMoves = (board: BoardSize, [row, col]: Position, visited: ReadonlySet<string>): Position[] =>
  KNIGHT_OFFSETS.map(([dr, dc]): Position => [row + dr, col + dc]).filter(
    (square) => isOnBoard(board, square) && !visited.has(squareKey(square)),
  );

export interface TourSearchOptions {
  start?: Position;
  /** Upper bound on search nodes expanded before giving up. */
  maxSteps?: number;
}

const DEFAULT_MAX_STEPS = 2_000_000;

const searchTour = (
  board: BoardSize,
  order: (candidates: Position[], visited: ReadonlySet<string>) => Position[],
  { start = [0, 0], maxSteps = DEFAULT_MAX_STEPS }: TourSearchOptions,
): SearchResult<Position[]> => {
  if (!isOnBoard(board, start)) {
    throw new Error(`Start square (${start[0]}, ${start[1]}) is off the board`);
  }

  const total = board.rows * board.cols;
  const path: Position[] = [start];
  const visited = new Set<string>([squareKey(start)]);
  let steps = 0;
  let exhausted = false;

  const extend = (): boolean => {
    steps += 1;
    if (steps > maxSteps) {
      exhausted = true;
      return false;
    }
    if (path.length === total) {
      return true;
    }

    const candidates = order(legalMoves(board, path[path.length - 1], visited), visited);
    for (const square of candidates) {
      path.push(square);
      visited.add(squareKey(square));
      if (extend()) {
        return true;
      }
      if (exhausted) {
        return false;
      }
      path.pop();
      visited.delete(squareKey(square));
    }
    return false;
  };

  if (extend()) {
    return { status: 'found', value: path };
  }
  return exhausted
    ? { status: 'gave-up', reason: `step budget of ${maxSteps} exhausted` }
    : { status: 'not-found' };
};

/** Depth-first search over moves in `KNIGHT_OFFSETS` order. */
export const solveTourBacktracking = (board: BoardSize, options: TourSearchOptions = {}): SearchResult<Position[]> =>
  searchTour(board, (candidates) => candidates, options);

/** Fewest onward moves first, encounter order among ties, backtracking on dead ends. */
export const solveTourWarnsdorff = (board: BoardSize, options: TourSearchOptions = {}): SearchResult<Position[]> =>
  searchTour(
    board,
    (candidates, visited) => {
      const degrees = new Map(
        candidates.map((square) => [squareKey(square), legalMoves(board, square, visited).length]),
      );
      const degreeOf = (square: Position) => degrees.get(squareKey(square)) ?? 0;
      return [...candidates].sort((a, b) => degreeOf(a) - degreeOf(b));
    },
    options,
  );

export interface RandomWalkOptions {
  start?: Position;
  maxAttempts?: number;
}

/** Uniformly random legal moves until stuck; retried from scratch up to `maxAttempts` times. */
export const solveTourRandomWalk = (
  board: BoardSize,
  rng: RandomSource,
  { start = [0, 0], maxAttempts = 100 }: RandomWalkOptions = {},
): SearchResult<Position[]> => {
  const total = board.rows * board.cols;

  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    const path: Position[] = [start];
    const visited = new Set<string>([squareKey(start)]);

    for (;;) {
      if (path.length === total) {
        return { status: 'found', value: path };
      }
      const moves = legalMoves(board, path[path.length - 1], visited);
      if (moves.length === 0) {
        break;
      }
      const next = rngChoice(rng, moves);
      path.push(next);
      visited.add(squareKey(next));
    }
  }

  return { status: 'gave-up', reason: `no tour after ${maxAttempts} random walks` };
};
