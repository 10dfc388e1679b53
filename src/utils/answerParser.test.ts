import { describe, expect, it } from 'vitest';
import { parseInteger, parseIntegerList, parsePairList, parseYesNo } from './answerParser';

describe('parseIntegerList', () => {
  it('reads flat integer lists', () => {
    expect(parseIntegerList('[1,3,0,2]')).toEqual({ ok: true, value: [1, 3, 0, 2] });
    expect(parseIntegerList('[ 1 , -2 , +3 ]')).toEqual({ ok: true, value: [1, -2, 3] });
    expect(parseIntegerList('[]')).toEqual({ ok: true, value: [] });
  });

  it('rejects trailing commas and decimals', () => {
    expect(parseIntegerList('[1,2,]')).toEqual({ ok: false, error: 'Trailing comma at position 5' });
    expect(parseIntegerList('[1.5]')).toEqual({
      ok: false,
      error: "Expected ',' or ']' but found '.' at position 3",
    });
  });

  it('rejects words, unbalanced brackets and trailing text', () => {
    expect(parseIntegerList('abc')).toEqual({ ok: false, error: "A list must start with '[' but found 'a'" });
    expect(parseIntegerList('[1,2')).toEqual({
      ok: false,
      error: "Expected ',' or ']' but found end of input at position 5",
    });
    expect(parseIntegerList('[1] x')).toEqual({ ok: false, error: "Unexpected 'x' after the closing bracket" });
  });

  it('rejects nested lists and oversized integers', () => {
    expect(parseIntegerList('[[1,2]]')).toEqual({ ok: false, error: 'Every list entry must be a single integer' });
    expect(parseIntegerList('[99999999999999999999]')).toEqual({
      ok: false,
      error: 'Integer 99999999999999999999 is out of range',
    });
  });
});

describe('parsePairList', () => {
  it('accepts bracket and parenthesis pairs', () => {
    expect(parsePairList('[(0,2), [1, 2]]')).toEqual({
      ok: true,
      value: [
        [0, 2],
        [1, 2],
      ],
    });
  });

  it('rejects entries that are not pairs', () => {
    const error = 'Every list entry must be a pair of two integers';
    expect(parsePairList('[[0,1,2]]')).toEqual({ ok: false, error });
    expect(parsePairList('[0,1]')).toEqual({ ok: false, error });
    expect(parsePairList('[[0,[1]]]')).toEqual({ ok: false, error });
  });

  it('requires a bracketed top-level list', () => {
    expect(parsePairList('((0,1))')).toEqual({ ok: false, error: "A list must start with '[' but found '('" });
  });
});

describe('parseInteger', () => {
  it('reads signed whole numbers', () => {
    expect(parseInteger(' 42 ')).toEqual({ ok: true, value: 42 });
    expect(parseInteger('-3')).toEqual({ ok: true, value: -3 });
  });

  it('rejects anything else', () => {
    expect(parseInteger('4.2')).toEqual({ ok: false, error: "'4.2' is not a whole number" });
    expect(parseInteger('seven')).toEqual({ ok: false, error: "'seven' is not a whole number" });
  });
});

describe('parseYesNo', () => {
  it('reads yes and no in any case', () => {
    expect(parseYesNo('Yes.')).toEqual({ ok: true, value: true });
    expect(parseYesNo('y')).toEqual({ ok: true, value: true });
    expect(parseYesNo('NO')).toEqual({ ok: true, value: false });
    expect(parseYesNo('n')).toEqual({ ok: true, value: false });
  });

  it('reads only the first word of a longer answer', () => {
    expect(parseYesNo('No, two queens attack')).toEqual({ ok: true, value: false });
    expect(parseYesNo('  yes it is legal')).toEqual({ ok: true, value: true });
  });

  it('rejects other words', () => {
    expect(parseYesNo('maybe')).toEqual({ ok: false, error: "'maybe' is neither yes nor no" });
    expect(parseYesNo('')).toEqual({ ok: false, error: "'' is neither yes nor no" });
    expect(parseYesNo('Nope')).toEqual({ ok: false, error: "'Nope' is neither yes nor no" });
    expect(parseYesNo('yesterday')).toEqual({ ok: false, error: "'yesterday' is neither yes nor no" });
    expect(parseYesNo('ye')).toEqual({ ok: false, error: "'ye' is neither yes nor no" });
  });
});
