import { describe, expect, it } from 'vitest';
import { seededRng } from '../../utils/random';
import { isValidHanoiMove } from './algorithms';
import { generateHanoiInstance, generateHanoiMoveScenario } from './generators';

describe('generateHanoiInstance', () => {
  it('stays within the disk and peg bounds', () => {
    const rng = seededRng(1);
    for (let i = 0; i < 30; i += 1) {
      const instance = generateHanoiInstance(rng);
      expect(instance.disks).toBeGreaterThanOrEqual(3);
      expect(instance.disks).toBeLessThanOrEqual(6);
      expect([3, 4]).toContain(instance.pegs);
      expect(instance.source).toBe(0);
      expect(instance.target).toBe(instance.pegs - 1);
    }
  });
});

describe('generateHanoiMoveScenario', () => {
  it('builds ordered pegs holding every disk once', () => {
    const rng = seededRng(2);
    for (let i = 0; i < 30; i += 1) {
      const { pegState = [], disks } = generateHanoiMoveScenario(rng, i % 2 === 0);
      const all = pegState.flat().sort((a, b) => a - b);
      expect(all).toEqual(Array.from({ length: disks }, (_, index) => index + 1));
      pegState.forEach((peg) => {
        for (let index = 1; index < peg.length; index += 1) {
          expect(peg[index]).toBeLessThan(peg[index - 1]);
        }
      });
    }
  });

  it('proposes a move whose legality matches the request', () => {
    const rng = seededRng(6);
    for (let i = 0; i < 30; i += 1) {
      const legal = i % 2 === 0;
      const { pegState = [], move = [0, 0] } = generateHanoiMoveScenario(rng, legal);
      expect(isValidHanoiMove(pegState, move[0], move[1])).toBe(legal);
    }
  });
});
