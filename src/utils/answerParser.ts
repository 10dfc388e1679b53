export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

type LiteralValue = number | LiteralValue[];

class LiteralSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LiteralSyntaxError';
  }
}

const INTEGER_PATTERN = /^[+-]?\d+/;

const describeChar = (char: string | undefined): string =>
  char === undefined ? 'end of input' : `'${char}'`;

const toSafeInteger = (digits: string): number => {
  const value = Number.parseInt(digits, 10);
  if (!Number.isSafeInteger(value)) {
    throw new LiteralSyntaxError(`Integer ${digits} is out of range`);
  }
  return value;
};

/**
 * Reads a bracketed literal made only of integers, commas and nested
 * `[...]` / `(...)` groups. Anything else is a syntax error.
 */
const readLiteral = (text: string): LiteralValue => {
  let pos = 0;

  const fail = (message: string): never => {
    throw new LiteralSyntaxError(message);
  };

  const skipWhitespace = () => {
    while (pos < text.length && /\s/.test(text[pos])) {
      pos += 1;
    }
  };

  const readValue = (): LiteralValue => {
    skipWhitespace();
    const char = text[pos];

    if (char === '[') {
      return readList(']');
    }
    if (char === '(') {
      return readList(')');
    }

    const match = INTEGER_PATTERN.exec(text.slice(pos));
    if (!match) {
      return fail(`Unexpected ${describeChar(char)} at position ${pos + 1}`);
    }
    pos += match[0].length;
    return toSafeInteger(match[0]);
  };

  const readList = (close: ']' | ')'): LiteralValue[] => {
    pos += 1;
    skipWhitespace();
    const items: LiteralValue[] = [];

    if (text[pos] === close) {
      pos += 1;
      return items;
    }

    for (;;) {
      items.push(readValue());
      skipWhitespace();
      const char = text[pos];

      if (char === ',') {
        pos += 1;
        skipWhitespace();
        if (text[pos] === close) {
          fail(`Trailing comma at position ${pos}`);
        }
        continue;
      }
      if (char === close) {
        pos += 1;
        return items;
      }
      fail(`Expected ',' or '${close}' but found ${describeChar(char)} at position ${pos + 1}`);
    }
  };

  skipWhitespace();
  if (text[pos] !== '[') {
    fail(`A list must start with '[' but found ${describeChar(text[pos])}`);
  }
  const value = readValue();
  skipWhitespace();
  if (pos < text.length) {
    fail(`Unexpected ${describeChar(text[pos])} after the closing bracket`);
  }
  return value;
};

const parseLiteral = (text: string): ParseResult<LiteralValue> => {
  try {
    return { ok: true, value: readLiteral(text) };
  } catch (error) {
    if (error instanceof LiteralSyntaxError) {
      return { ok: false, error: error.message };
    }
    throw error;
  }
};

export const parseInteger = (text: string): ParseResult<number> => {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return { ok: false, error: `'${trimmed}' is not a whole number` };
  }

  const value = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) {
    return { ok: false, error: `${trimmed} is out of range` };
  }
  return { ok: true, value };
};

/** Reads the first word only: "yes"/"y" or "no"/"n", in any case. */
export const parseYesNo = (text: string): ParseResult<boolean> => {
  const word = /^[a-z]+/.exec(text.trim().toLowerCase())?.[0] ?? '';
  if (word === 'yes' || word === 'y') {
    return { ok: true, value: true };
  }
  if (word === 'no' || word === 'n') {
    return { ok: true, value: false };
  }
  return { ok: false, error: `'${text.trim()}' is neither yes nor no` };
};

export const parseIntegerList = (text: string): ParseResult<number[]> => {
  const parsed = parseLiteral(text);
  if (!parsed.ok) {
    return parsed;
  }

  const { value } = parsed;
  if (!Array.isArray(value)) {
    return { ok: false, error: 'Expected a list' };
  }

  const numbers: number[] = [];
  for (const item of value) {
    if (typeof item !== 'number') {
      return { ok: false, error: 'Every list entry must be a single integer' };
    }
    numbers.push(item);
  }
  return { ok: true, value: numbers };
};

export const parsePairList = (text: string): ParseResult<Array<[number, number]>> => {
  const parsed = parseLiteral(text);
  if (!parsed.ok) {
    return parsed;
  }

  const { value } = parsed;
  if (!Array.isArray(value)) {
    return { ok: false, error: 'Expected a list' };
  }

  const pairs: Array<[number, number]> = [];
  for (const item of value) {
    if (!Array.isArray(item) || item.length !== 2) {
      return { ok: false, error: 'Every list entry must be a pair of two integers' };
    }
    const [first, second] = item;
    if (typeof first !== 'number' || typeof second !== 'number') {
      return { ok: false, error: 'Every list entry must be a pair of two integers' };
    }
    pairs.push([first, second]);
  }
  return { ok: true, value: pairs };
};
