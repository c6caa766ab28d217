import { writeFile } from 'fs/promises';
import type { Trigger } from '../shared/types/index.js';

export const TRIGGER_FILENAME = 'triggers.txt';
export const CALIBRATION_TRIGGER = 'calibration_trigger';

// Symbols that mark timing rather than a presented letter
export const NON_LETTER_SYMBOLS: ReadonlySet<string> = new Set(['+', 'PLUS', CALIBRATION_TRIGGER]);

export function formatTriggers(triggers: readonly Trigger[]): string {
  return triggers
    .map(trigger => `${trigger.symbol} ${trigger.type} ${trigger.timestamp.toFixed(4)}`)
    .join('\n') + '\n';
}

export async function writeTriggers(path: string, triggers: readonly Trigger[]): Promise<void> {
  await writeFile(path, formatTriggers(triggers), 'utf-8');
}

/**
 * Presented letters of an inquiry, in order, with timing marks dropped.
 * Throws when a letter is outside the alphabet.
 */
export function presentedLetters(triggers: readonly Trigger[], alphabet: readonly string[]): string[] {
  const letters = triggers
    .filter(trigger => !NON_LETTER_SYMBOLS.has(trigger.symbol) && trigger.type !== 'first_pres_target')
    .map(trigger => trigger.symbol);

  const invalid = [...new Set(letters.filter(letter => !alphabet.includes(letter)))];
  if (invalid.length > 0) {
    throw new Error(`Unexpected letters received in copy phrase: ${invalid.join(', ')}`);
  }
  return letters;
}
