import type { MinimaxInstance, MinimaxNode, RandomSource } from '../../types/problem';
import { rngInt } from '../../utils/random';

export const MIN_TREE_DEPTH = 3;

/**
 * Random game tree of exactly `depth` levels (the root is level 1). Below level
 * 3 a branch may stop early as a leaf; the level above the leaves fans out to
 * 2-4 children, higher levels to 2-3. Leaves hold integers 1..20.
 */
export const generateMinimaxTree = (rng: RandomSource, depth: number): MinimaxNode => {
  const build = (level: number): MinimaxNode => {
    const stopsEarly = level >= 3 && rng() < 0.5;
    if (level === depth || stopsEarly) {
      return { kind: 'leaf', value: rngInt(rng, 1, 20) };
    }

    const childCount = level < depth - 1 ? rngInt(rng, 2, 3) : rngInt(rng, 2, 4);
    return {
      kind: 'branch',
      children: Array.from({ length: childCount }, () => build(level + 1)),
    };
  };

  return build(1);
};

export const generateMinimaxInstance = (rng: RandomSource, maxDepth: number): MinimaxInstance => {
  const depth = rngInt(rng, MIN_TREE_DEPTH, Math.max(MIN_TREE_DEPTH, maxDepth));
  return { topic: 'minimax', tree: generateMinimaxTree(rng, depth), depth };
};
