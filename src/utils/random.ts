import type { RandomSource } from '../types/problem';

/** Park-Miller minimal standard generator. */
export const seededRng = (seed: number): RandomSource => {
  let state = Math.floor(seed) % 2147483647;
  if (state <= 0) state += 2147483646;
  const next = () => {
    state = (state * 16807) % 2147483647;
    return (state - 1) / 2147483646;
  };
  // The first draw grows almost linearly with the seed; drop it.
  next();
  return next;
};

export const createRandomSource = (seed: number | null): RandomSource =>
  seed === null ? Math.random : seededRng(seed);

/** Inclusive on both ends. */
export const rngInt = (rng: RandomSource, min: number, max: number): number =>
  Math.floor(rng() * (max - min + 1)) + min;

export const rngChoice = <T>(rng: RandomSource, list: readonly T[]): T => {
  if (list.length === 0) {
    throw new Error('rngChoice requires a non-empty list');
  }
  return list[Math.floor(rng() * list.length) % list.length];
};

export const shuffleInPlace = <T>(rng: RandomSource, list: T[]): void => {
  for (let i = list.length - 1; i > 0; i -= 1) {
    const j = Math.floor(rng() * (i + 1));
    [list[i], list[j]] = [list[j], list[i]];
  }
};

/** `count` distinct items in random order. */
export const rngSample = <T>(rng: RandomSource, list: readonly T[], count: number): T[] => {
  const copy = [...list];
  shuffleInPlace(rng, copy);
  return copy.slice(0, Math.min(count, copy.length));
};
