import type { HanoiInstance, HanoiMove, RandomSource } from '../../types/problem';
import { rngChoice, rngInt } from '../../utils/random';
import { isValidHanoiMove } from './algorithms';

export const MIN_DISKS = 3;
export const MAX_DISKS = 6;

export interface HanoiInstanceOptions {
  minDisks?: number;
  maxDisks?: number;
  pegChoices?: readonly number[];
}

/** Full tower on peg 0, to be moved to the last peg. */
export const generateHanoiInstance = (
  rng: RandomSource,
  { minDisks = MIN_DISKS, maxDisks = MAX_DISKS, pegChoices = [3, 4] }: HanoiInstanceOptions = {},
): HanoiInstance => {
  const pegs = rngChoice(rng, pegChoices);
  return {
    topic: 'hanoi',
    disks: rngInt(rng, minDisks, maxDisks),
    pegs,
    source: 0,
    target: pegs - 1,
  };
};

/** A legal mid-game position on three pegs plus a proposed move, legal or not. */
export const generateHanoiMoveScenario = (rng: RandomSource, legal: boolean): HanoiInstance => {
  const disks = rngInt(rng, MIN_DISKS, MAX_DISKS);
  const pegState: number[][] = [[], [], []];

  // largest first so every peg stays ordered bottom to top
  for (let disk = disks; disk >= 1; disk -= 1) {
    pegState[rngInt(rng, 0, 2)].push(disk);
  }

  const moves: HanoiMove[] = [];
  for (let from = 0; from < 3; from += 1) {
    for (let to = 0; to < 3; to += 1) {
      if (from !== to) {
        moves.push([from, to]);
      }
    }
  }

  // at least one disk exists, so the smallest one can always move somewhere
  const legalMoves = moves.filter(([from, to]) => isValidHanoiMove(pegState, from, to));
  const illegalMoves = moves.filter(([from, to]) => !isValidHanoiMove(pegState, from, to));
  const pool = legal || illegalMoves.length === 0 ? legalMoves : illegalMoves;

  return {
    topic: 'hanoi',
    disks,
    pegs: 3,
    source: 0,
    target: 2,
    pegState,
    move: rngChoice(rng, pool),
  };
};
