/**
 * Formatting helpers for prompts, feedback and reference solutions
 */

import type { Edge, MinimaxNode, PegState, Position } from '../types/problem';

/**
 * Formats a duration in milliseconds as seconds with microsecond precision
 * @param durationMs - Duration in milliseconds
 * @returns Formatted string like "0.001234s", or "—" if invalid
 */
export const formatSeconds = (durationMs: number | undefined | null): string => {
  if (durationMs === undefined || durationMs === null || !Number.isFinite(durationMs) || durationMs < 0) {
    return '—';
  }

  return `${(durationMs / 1000).toFixed(6)}s`;
};

/**
 * Formats a board square for feedback text
 * @returns String like "(2, 3)"
 */
export const formatSquare = ([row, col]: Position): string => `(${row}, ${col})`;

/**
 * Serializes a list in the literal answer format, e.g. "[1,3,0,2]" or "[[0,2],[0,1]]"
 */
export const formatLiteral = (value: readonly number[] | ReadonlyArray<readonly number[]>): string =>
  JSON.stringify(value);

export const pegLabel = (peg: number): string => String.fromCharCode(65 + peg);

/**
 * Formats peg contents bottom-to-top, e.g. "A: [3, 1] | B: [] | C: [2]"
 */
export const formatPegState = (pegs: PegState): string =>
  pegs.map((disks, peg) => `${pegLabel(peg)}: [${disks.join(', ')}]`).join(' | ');

export const formatEdges = (edges: readonly Edge[]): string =>
  edges.map(([u, v]) => `${u}-${v}`).join(', ');

/**
 * Formats a game tree as a nested list of leaf values, e.g. "[[3, 5], [2, 9]]"
 */
export const formatTree = (node: MinimaxNode): string =>
  node.kind === 'leaf' ? String(node.value) : `[${node.children.map(formatTree).join(', ')}]`;

/**
 * Formats a move count with thousands separators
 * @returns String like "1,048,575"
 */
export const formatCount = (value: number): string => value.toLocaleString('en-US');
