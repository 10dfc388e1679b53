import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { RaceTiming } from '../types/quiz';

export interface RaceEntry {
  name: string;
  /** Returns whether the algorithm produced a usable result. */
  run: () => boolean;
}

export interface RaceOutcome {
  winner: string;
  timings: RaceTiming[];
}

export { yieldToEventLoop };

const runTimed = async (entry: RaceEntry): Promise<RaceTiming> => {
  await yieldToEventLoop();
  const startedAt = performance.now();
  const succeeded = entry.run();
  return {
    name: entry.name,
    durationMs: performance.now() - startedAt,
    succeeded,
  };
};

/**
 * Runs the entries one after another, each on its own event-loop turn, and
 * times each run separately. The algorithms never overlap. The winner is the fastest entry that succeeded, or the fastest overall when
 * none did.
 */
export const raceAlgorithms = async (entries: readonly RaceEntry[]): Promise<RaceOutcome> => {
  if (entries.length < 2) {
    throw new Error('A race needs at least two algorithms');
  }

  const timings = await Promise.all(entries.map(runTimed));

  const finishers = timings.filter((timing) => timing.succeeded);
  const pool = finishers.length > 0 ? finishers : timings;
  const fastest = pool.reduce((best, timing) => (timing.durationMs < best.durationMs ? timing : best));

  return { winner: fastest.name, timings };
};
