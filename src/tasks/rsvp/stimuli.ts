// RSVP inquiry generation

export const BACKSPACE_CHAR = '<';
export const SPACE_CHAR = '_';
export const FIXATION_CHAR = '+';

export const DEFAULT_ALPHABET: readonly string[] = [
  ...'ABCDEFGHIJKLMNOPQRSTUVWXYZ',
  SPACE_CHAR,
  BACKSPACE_CHAR,
];

export type Random = () => number;

// Draw `count` distinct symbols (partial Fisher-Yates)
export function sampleSymbols(alphabet: readonly string[], count: number, random: Random = Math.random): string[] {
  if (count > alphabet.length) {
    throw new RangeError(`Cannot draw ${count} distinct symbols from an alphabet of ${alphabet.length}`);
  }
  const pool = [...alphabet];
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, count);
}

export interface CalibrationInquiry {
  target: string;
  symbols: string[];
}

export function calibrationInquiry(
  alphabet: readonly string[],
  length: number,
  random: Random = Math.random
): CalibrationInquiry {
  const symbols = sampleSymbols(alphabet, length, random);
  const target = symbols[Math.floor(random() * symbols.length)];
  return { target, symbols };
}

// Inquiry that is guaranteed to show the target somewhere among its symbols
export function inquiryWithTarget(
  alphabet: readonly string[],
  length: number,
  target: string,
  random: Random = Math.random
): string[] {
  const others = sampleSymbols(alphabet.filter(symbol => symbol !== target), length - 1, random);
  const position = Math.floor(random() * length);
  return [...others.slice(0, position), target, ...others.slice(position)];
}
