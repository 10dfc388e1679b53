import { describe, expect, it } from 'vitest';
import { areSimilar } from './stringMatching';

describe('areSimilar', () => {
  it('tolerates small typos within the distance budget', () => {
    expect(areSimilar('Chromatic Numbr', 'Chromatic Number', 3)).toBe(true);
    expect(areSimilar('Warnsdorf', "Warnsdorff's Rule", 3)).toBe(true);
    expect(areSimilar('Decrease', 'decreases', 1)).toBe(true);
  });

  it('ignores case and surrounding whitespace', () => {
    expect(areSimilar('  WELSH-POWELL ', 'Welsh-Powell')).toBe(true);
  });

  it('rejects distant strings and empty input', () => {
    expect(areSimilar('Greedy', 'Welsh-Powell')).toBe(false);
    expect(areSimilar('increases', 'decreases', 1)).toBe(false);
    expect(areSimilar('', 'anything')).toBe(false);
  });
});
