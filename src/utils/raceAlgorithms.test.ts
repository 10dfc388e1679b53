import { afterEach, describe, expect, it, vi } from 'vitest';
import { raceAlgorithms } from './raceAlgorithms';

const mockClock = (...readings: number[]) => {
  const spy = vi.spyOn(performance, 'now');
  readings.forEach((reading) => spy.mockReturnValueOnce(reading));
  return spy;
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('raceAlgorithms', () => {
  it('picks the fastest algorithm that succeeded', async () => {
    mockClock(0, 5, 10, 12);
    const outcome = await raceAlgorithms([
      { name: 'Slow', run: () => true },
      { name: 'Fast', run: () => true },
    ]);

    expect(outcome.winner).toBe('Fast');
    expect(outcome.timings).toEqual([
      { name: 'Slow', durationMs: 5, succeeded: true },
      { name: 'Fast', durationMs: 2, succeeded: true },
    ]);
  });

  it('ignores a faster algorithm that produced nothing', async () => {
    mockClock(0, 5, 10, 12);
    const outcome = await raceAlgorithms([
      { name: 'Steady', run: () => true },
      { name: 'Quitter', run: () => false },
    ]);

    expect(outcome.winner).toBe('Steady');
  });

  it('falls back to the fastest overall when every algorithm fails', async () => {
    mockClock(0, 5, 10, 12, 20, 21);
    const outcome = await raceAlgorithms([
      { name: 'A', run: () => false },
      { name: 'B', run: () => false },
      { name: 'C', run: () => false },
    ]);

    expect(outcome.winner).toBe('C');
  });

  it('runs each algorithm exactly once', async () => {
    const first = vi.fn(() => true);
    const second = vi.fn(() => true);
    await raceAlgorithms([
      { name: 'First', run: first },
      { name: 'Second', run: second },
    ]);

    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('runs the algorithms one after another in entry order', async () => {
    const events: string[] = [];
    const entry = (name: string) => ({
      name,
      run: () => {
        events.push(`start ${name}`);
        events.push(`end ${name}`);
        return true;
      },
    });

    await raceAlgorithms([entry('A'), entry('B'), entry('C')]);

    expect(events).toEqual(['start A', 'end A', 'start B', 'end B', 'start C', 'end C']);
  });

  it('needs at least two algorithms', async () => {
    await expect(raceAlgorithms([{ name: 'Alone', run: () => true }])).rejects.toThrow(
      'A race needs at least two algorithms',
    );
  });
});
