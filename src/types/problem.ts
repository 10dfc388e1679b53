export type TopicId = 'n-queens' | 'hanoi' | 'graph-coloring' | 'knights-tour' | 'minimax';

export type QuestionKind =
  | 'solution'
  | 'complexity'
  | 'strategy'
  | 'theory'
  | 'validation'
  | 'computation'
  | 'race';

export interface ProblemTopic {
  id: TopicId;
  label: string;
  description: string;
}

/** `[row, col]`, zero-based. */
export type Position = readonly [number, number];

export type HanoiMove = readonly [from: number, to: number];

/** Disk sizes per peg, bottom to top; 1 is the smallest disk. */
export type PegState = ReadonlyArray<readonly number[]>;

export type Edge = readonly [number, number];

export interface Graph {
  vertexCount: number;
  edges: readonly Edge[];
}

export type GraphFamily = 'complete' | 'cycle' | 'bipartite' | 'random';

export interface BoardSize {
  rows: number;
  cols: number;
}

export type MinimaxNode =
  | { kind: 'leaf'; value: number }
  | { kind: 'branch'; children: readonly MinimaxNode[] };

export interface NQueensInstance {
  topic: 'n-queens';
  size: number;
  placement?: readonly number[];
}

export interface HanoiInstance {
  topic: 'hanoi';
  disks: number;
  pegs: number;
  source: number;
  target: number;
  pegState?: PegState;
  move?: HanoiMove;
}

export interface GraphColoringInstance {
  topic: 'graph-coloring';
  graph: Graph;
  family: GraphFamily;
  colorBudget: number;
  chromaticNumber?: number;
  coloring?: readonly number[];
}

export interface KnightsTourInstance {
  topic: 'knights-tour';
  rows: number;
  cols: number;
  start?: Position;
  path?: readonly Position[];
  nextSquare?: Position;
}

export interface MinimaxInstance {
  topic: 'minimax';
  tree: MinimaxNode;
  depth: number;
}

export type ProblemInstance =
  | NQueensInstance
  | HanoiInstance
  | GraphColoringInstance
  | KnightsTourInstance
  | MinimaxInstance;

/**
 * Outcome of a search. `not-found` means the search space was exhausted,
 * `gave-up` means a step, restart or time budget ran out first.
 */
export type SearchResult<T> =
  | { status: 'found'; value: T }
  | { status: 'not-found' }
  | { status: 'gave-up'; reason: string };

/** Returns a float in [0, 1). */
export type RandomSource = () => number;
