import type { HanoiMove, PegState } from '../../types/problem';

export type HanoiMoveCheck =
  | { valid: true }
  | { valid: false; reason: 'empty-source'; from: number }
  | { valid: false; reason: 'size-violation'; disk: number; onto: number };

/** Source peg holds disks `disks..1`, bottom to top; every other peg is empty. */
export const createPegState = (disks: number, pegs: number, source: number): number[][] =>
  Array.from({ length: pegs }, (_, peg) =>
    peg === source ? Array.from({ length: disks }, (_, index) => disks - index) : [],
  );

const topDisk = (peg: readonly number[]): number | undefined => peg[peg.length - 1];

export const checkHanoiMove = (pegState: PegState, from: number, to: number): HanoiMoveCheck => {
  const disk = topDisk(pegState[from] ?? []);
  if (disk === undefined) {
    return { valid: false, reason: 'empty-source', from };
  }

  const onto = topDisk(pegState[to] ?? []);
  if (onto !== undefined && disk > onto) {
    return { valid: false, reason: 'size-violation', disk, onto };
  }

  return { valid: true };
};

export const isValidHanoiMove = (pegState: PegState, from: number, to: number): boolean =>
  checkHanoiMove(pegState, from, to).valid;

/** Returns a new state; the caller is expected to have checked the move. */
export const applyHanoiMove = (pegState: PegState, [from, to]: HanoiMove): number[][] => {
  const next = pegState.map((peg) => [...peg]);
  const disk = next[from].pop();
  if (disk === undefined) {
    throw new Error(`Cannot move from empty peg ${from}`);
  }
  next[to].push(disk);
  return next;
};

const auxiliaryPeg = (source: number, target: number): number => 3 - source - target;

export const solveHanoiRecursive = (disks: number, source = 0, target = 2): HanoiMove[] => {
  const moves: HanoiMove[] = [];

  const move = (count: number, from: number, to: number, via: number) => {
    if (count === 0) {
      return;
    }
    move(count - 1, from, via, to);
    moves.push([from, to]);
    move(count - 1, via, to, from);
  };

  move(disks, source, target, auxiliaryPeg(source, target));
  return moves;
};

/**
 * Recursive decomposition that caches each (count, from, to) sub-sequence and
 * reuses it instead of recomputing it.
 */
export const solveHanoiMemoized = (disks: number, source = 0, target = 2): HanoiMove[] => {
  const cache = new Map<string, readonly HanoiMove[]>();

  const sequence = (count: number, from: number, to: number): readonly HanoiMove[] => {
    if (count === 0) {
      return [];
    }
    const key = `${count}:${from}:${to}`;
    const cached = cache.get(key);
    if (cached) {
      return cached;
    }

    const via = auxiliaryPeg(from, to);
    const moves: HanoiMove[] = [...sequence(count - 1, from, via), [from, to], ...sequence(count - 1, via, to)];
    cache.set(key, moves);
    return moves;
  };

  return [...sequence(disks, source, target)];
};

type HanoiTask =
  | { type: 'split'; count: number; from: number; to: number; via: number }
  | { type: 'move'; from: number; to: number };

/** Same decomposition as the recursive solver, driven by an explicit stack. */
export const solveHanoiIterative = (disks: number, source = 0, target = 2): HanoiMove[] => {
  const moves: HanoiMove[] = [];
  const stack: HanoiTask[] = [
    { type: 'split', count: disks, from: source, to: target, via: auxiliaryPeg(source, target) },
  ];

  for (let task = stack.pop(); task !== undefined; task = stack.pop()) {
    if (task.type === 'move') {
      moves.push([task.from, task.to]);
      continue;
    }

    const { count, from, to, via } = task;
    if (count === 0) {
      continue;
    }

    // pushed in reverse execution order
    stack.push({ type: 'split', count: count - 1, from: via, to, via: from });
    stack.push({ type: 'move', from, to });
    stack.push({ type: 'split', count: count - 1, from, to: via, via: to });
  }

  return moves;
};

/**
 * Closed form: move m goes from (m & (m - 1)) % 3 to ((m | (m - 1)) + 1) % 3 on
 * canonical pegs. With an even disk count that pattern ends on the middle peg,
 * so the two non-source pegs swap roles.
 */
export const solveHanoiBinaryPattern = (disks: number, source = 0, target = 2): HanoiMove[] => {
  const aux = auxiliaryPeg(source, target);
  const pegs = disks % 2 === 0 ? [source, target, aux] : [source, aux, target];
  const total = 2 ** disks - 1;
  const moves: HanoiMove[] = [];

  for (let m = 1; m <= total; m += 1) {
    moves.push([pegs[(m & (m - 1)) % 3], pegs[((m | (m - 1)) + 1) % 3]]);
  }

  return moves;
};

const frameStewartMemo = new Map<string, { count: number; split: number }>();

const frameStewart = (disks: number, pegs: number): { count: number; split: number } => {
  if (disks === 0) {
    return { count: 0, split: 0 };
  }
  if (disks === 1) {
    return { count: 1, split: 0 };
  }
  if (pegs <= 3) {
    return { count: 2 ** disks - 1, split: disks - 1 };
  }

  const key = `${disks}:${pegs}`;
  const cached = frameStewartMemo.get(key);
  if (cached) {
    return cached;
  }

  let best = { count: Number.POSITIVE_INFINITY, split: 1 };
  for (let split = 1; split < disks; split += 1) {
    const count = 2 * frameStewart(split, pegs).count + frameStewart(disks - split, pegs - 1).count;
    if (count < best.count) {
      best = { count, split };
    }
  }

  frameStewartMemo.set(key, best);
  return best;
};

/** Minimum move count under the Frame-Stewart strategy; 2^n - 1 for three pegs. */
export const frameStewartMoveCount = (disks: number, pegs: number): number =>
  frameStewart(disks, pegs).count;

export const solveHanoiFrameStewart = (
  disks: number,
  pegs: number,
  source: number,
  target: number,
): HanoiMove[] => {
  if (pegs < 3) {
    throw new Error(`Tower of Hanoi needs at least 3 pegs, got ${pegs}`);
  }

  const moves: HanoiMove[] = [];

  const solve = (count: number, from: number, to: number, available: readonly number[]) => {
    if (count === 0) {
      return;
    }
    if (count === 1) {
      moves.push([from, to]);
      return;
    }

    const spare = available.filter((peg) => peg !== from && peg !== to);
    if (available.length === 3) {
      solve(count - 1, from, spare[0], available);
      moves.push([from, to]);
      solve(count - 1, spare[0], to, available);
      return;
    }

    const { split } = frameStewart(count, available.length);
    const parking = spare[0];
    solve(split, from, parking, available);
    solve(
      count - split,
      from,
      to,
      available.filter((peg) => peg !== parking),
    );
    solve(split, parking, to, available);
  };

  solve(
    disks,
    source,
    target,
    Array.from({ length: pegs }, (_, peg) => peg),
  );
  return moves;
};

export type HanoiReplayResult =
  | { ok: true; finalState: number[][] }
  | { ok: false; moveIndex: number; check: Exclude<HanoiMoveCheck, { valid: true }> };

/** Replays moves from `initial`, stopping at the first illegal one. */
export const replayHanoiMoves = (initial: PegState, moves: readonly HanoiMove[]): HanoiReplayResult => {
  let state = initial.map((peg) => [...peg]);

  for (let index = 0; index < moves.length; index += 1) {
    const [from, to] = moves[index];
    const check = checkHanoiMove(state, from, to);
    if (!check.valid) {
      return { ok: false, moveIndex: index, check };
    }
    state = applyHanoiMove(state, moves[index]);
  }

  return { ok: true, finalState: state };
};
