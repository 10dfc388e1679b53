import { distance } from 'fastest-levenshtein';

/**
 * Case-insensitive fuzzy match. Either string containing the other also counts.
 * Empty input never matches.
 */
export const areSimilar = (a: string, b: string, maxDistance = 2): boolean => {
  const left = a.trim().toLowerCase();
  const right = b.trim().toLowerCase();

  if (left.length === 0 || right.length === 0) {
    return false;
  }

  if (left.includes(right) || right.includes(left)) {
    return true;
  }

  return distance(left, right) <= maxDistance;
};
