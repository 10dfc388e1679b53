import type { KnightsTourInstance, Position, RandomSource } from '../../types/problem';
import { rngChoice, rngInt } from '../../utils/random';
import { isLegalNextSquare, KNIGHT_OFFSETS } from './algorithms';

/** Square boards that admit an open tour from the corner. */
export const TOUR_BOARD_SIZES: readonly number[] = [5, 6];

export const generateTourInstance = (
  rng: RandomSource,
  sizes: readonly number[] = TOUR_BOARD_SIZES,
): KnightsTourInstance => {
  const size = rngChoice(rng, sizes);
  return { topic: 'knights-tour', rows: size, cols: size, start: [0, 0] };
};

const randomPartialPath = (rng: RandomSource, size: number, length: number): Position[] => {
  const board = { rows: size, cols: size };
  const path: Position[] = [[rngInt(rng, 0, size - 1), rngInt(rng, 0, size - 1)]];

  while (path.length < length) {
    const [row, col] = path[path.length - 1];
    const moves = KNIGHT_OFFSETS.map(([dr, dc]): Position => [row + dr, col + dc]).filter((square) =>
      isLegalNextSquare(board, path, square),
    );
    if (moves.length === 0) {
      break;
    }
    path.push(rngChoice(rng, moves));
  }

  return path;
};

/**
 * A partial random-walk path on a 5x5 to 8x8 board and a proposed next square.
 * Illegal proposals are either a revisit or a square that is not a knight move away.
 */
export const generateNextMoveScenario = (rng: RandomSource, legal: boolean): KnightsTourInstance => {
  const size = rngInt(rng, 5, 8);
  const board = { rows: size, cols: size };
  const squares: Position[] = [];
  for (let row = 0; row < size; row += 1) {
    for (let col = 0; col < size; col += 1) {
      squares.push([row, col]);
    }
  }

  // a walk can strand itself with no legal continuation; draw another
  for (;;) {
    const path = randomPartialPath(rng, size, rngInt(rng, 3, 8));
    const candidates = squares.filter((square) => isLegalNextSquare(board, path, square) === legal);
    if (candidates.length > 0) {
      return { topic: 'knights-tour', rows: size, cols: size, path, nextSquare: rngChoice(rng, candidates) };
    }
  }
};
