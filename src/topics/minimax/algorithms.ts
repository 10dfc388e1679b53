import type { MinimaxNode } from '../../types/problem';

export const minimax = (node: MinimaxNode, maximizing = true): number => {
  if (node.kind === 'leaf') {
    return node.value;
  }

  const values = node.children.map((child) => minimax(child, !maximizing));
  return maximizing ? Math.max(...values) : Math.min(...values);
};

export interface AlphaBetaResult {
  value: number;
  /** Leaf values in the order the search evaluated them. */
  visitedLeaves: number[];
}

/** Maximizer moves first; a child loop stops as soon as beta <= alpha. */
export const alphaBeta = (tree: MinimaxNode): AlphaBetaResult => {
  const visitedLeaves: number[] = [];

  const search = (node: MinimaxNode, alpha: number, beta: number, maximizing: boolean): number => {
    if (node.kind === 'leaf') {
      visitedLeaves.push(node.value);
      return node.value;
    }

    let best = maximizing ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
    for (const child of node.children) {
      const value = search(child, alpha, beta, !maximizing);
      if (maximizing) {
        best = Math.max(best, value);
        alpha = Math.max(alpha, best);
      } else {
        best = Math.min(best, value);
        beta = Math.min(beta, best);
      }
      if (beta <= alpha) {
        break;
      }
    }
    return best;
  };

  const value = search(tree, Number.NEGATIVE_INFINITY, Number.POSITIVE_INFINITY, true);
  return { value, visitedLeaves };
};

export const countLeaves = (node: MinimaxNode): number =>
  node.kind === 'leaf' ? 1 : node.children.reduce((total, child) => total + countLeaves(child), 0);
