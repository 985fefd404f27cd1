import { InputError } from '../errors.js';

// Written figure numbers joined with "," ("" for an empty figure) -> intervals above the bass
export type ShorthandTable = ReadonlyMap<string, readonly number[]>;

export const DEFAULT_SHORTHAND: ShorthandTable = new Map<string, readonly number[]>([
  ['', [5, 3]],
  ['5', [5, 3]],
  ['6', [6, 3]],
  ['7', [7, 5, 3]],
  ['9', [9, 7, 5, 3]],
  ['11', [11, 9, 7, 5, 3]],
  ['13', [13, 11, 9, 7, 5, 3]],
  ['6,5', [6, 5, 3]],
  ['4,3', [6, 4, 3]],
  ['4,2', [6, 4, 2]],
  ['2', [6, 4, 2]],
]);

// An accidental attached to a figure. `alter` is the chromatic shift; a natural is 0.
export interface Modifier {
  readonly symbol: string;
  readonly alter: number;
}

export interface FigureTone {
  readonly number: number;
  readonly modifier: Modifier | null;
}

export interface Figure {
  readonly notation: string;
  // Longhand, in the order of the shorthand table (e.g. 6, 5, 3)
  readonly tones: readonly FigureTone[];
}

const MODIFIER_ALTERS: Record<string, number> = {
  '#': 1,
  '+': 1,
  '\\': 1,
  '##': 2,
  '++': 2,
  '###': 3,
  '+++': 3,
  '-': -1,
  b: -1,
  '/': -1,
  '--': -2,
  bb: -2,
  '---': -3,
  bbb: -3,
  n: 0,
};

export function parseModifier(symbol: string): Modifier {
  const alter = MODIFIER_ALTERS[symbol];
  if (alter === undefined) {
    throw new InputError(`Unknown figure modifier: "${symbol}"`);
  }
  return { symbol, alter };
}

interface WrittenFigure {
  number: number | null;
  modifier: Modifier | null;
}

function parseWrittenFigure(item: string, notation: string): WrittenFigure {
  const match = /^([^\d]*)(\d*)([^\d]*)$/.exec(item);
  if (!match) {
    throw new InputError(`Malformed figure "${item}" in "${notation}"`);
  }
  const [, prefix, digits, suffix] = match;
  if (prefix && suffix) {
    throw new InputError(`Figure "${item}" in "${notation}" has two modifiers`);
  }
  const number = digits ? parseInt(digits, 10) : null;
  if (number !== null && number < 2) {
    throw new InputError(`Figure "${item}" in "${notation}" must be an interval of 2 or more`);
  }
  const symbol = prefix || suffix;
  return { number, modifier: symbol ? parseModifier(symbol) : null };
}

// Parses a figure column such as "6,4+,2" or "#" and expands shorthand into longhand.
// A modifier without a number applies to the third.
export function parseFigure(
  notation: string,
  shorthand: ShorthandTable = DEFAULT_SHORTHAND,
): Figure {
  const written = notation.split(',').map((item) => parseWrittenFigure(item.trim(), notation));
  const key = written.map((w) => (w.number === null ? '' : String(w.number))).join(',');
  const numbers = written.map((w) => w.number ?? 3);
  const longhand = shorthand.get(key);

  if (!longhand) {
    return {
      notation,
      tones: written.map((w, i) => ({ number: numbers[i], modifier: w.modifier })),
    };
  }

  const tones = longhand.map((number) => {
    const index = numbers.indexOf(number);
    return { number, modifier: index >= 0 ? written[index].modifier : null };
  });
  return { notation, tones };
}

// New alteration for a scale tone once a figure modifier is applied to it
export function modifyAlteration(alt: number, modifier: Modifier | null): number {
  if (!modifier) return alt;
  if (modifier.alter === 0 || alt === 0) return modifier.alter;
  return alt + modifier.alter;
}
