import type { NQueensInstance, RandomSource } from '../../types/problem';
import { rngChoice, rngInt, shuffleInPlace } from '../../utils/random';
import { countAttackingPairs, findAllNQueensSolutions } from './algorithms';

export const MIN_BOARD_SIZE = 4;
export const MAX_BOARD_SIZE = 8;

export const generateNQueensInstance = (
  rng: RandomSource,
  minSize = MIN_BOARD_SIZE,
  maxSize = MAX_BOARD_SIZE,
): NQueensInstance => ({
  topic: 'n-queens',
  size: rngInt(rng, minSize, maxSize),
});

/**
 * A board with a placement to judge. Valid placements are drawn from the full
 * solution set; invalid ones are shuffled rows with at least one attack.
 */
export const generateQueensPlacementInstance = (rng: RandomSource, valid: boolean): NQueensInstance => {
  const { size } = generateNQueensInstance(rng);

  if (valid) {
    return { topic: 'n-queens', size, placement: rngChoice(rng, findAllNQueensSolutions(size)) };
  }

  const placement = Array.from({ length: size }, (_, row) => row);
  do {
    shuffleInPlace(rng, placement);
  } while (countAttackingPairs(placement) === 0);

  return { topic: 'n-queens', size, placement };
};
