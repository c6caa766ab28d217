import { z } from 'zod';
import { NON_LETTER_SYMBOLS } from '../triggers.js';
import { DEFAULT_ALPHABET } from './stimuli.js';

// Symbols must be distinct and never collide with a timing mark in the trigger log
const alphabetSchema = z.array(z.string().min(1)).min(2).superRefine((alphabet, ctx) => {
  const repeated = [...new Set(alphabet.filter((symbol, i) => alphabet.indexOf(symbol) !== i))];
  if (repeated.length > 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `symbols must be unique (repeated: ${repeated.join(', ')})` });
  }
  const reserved = alphabet.filter(symbol => NON_LETTER_SYMBOLS.has(symbol));
  if (reserved.length > 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `cannot contain timing marks (${reserved.join(', ')})` });
  }
});

// Parameter files often carry numbers as strings, so numeric options coerce.
const rsvpShape = {
  alphabet: alphabetSchema.default([...DEFAULT_ALPHABET]),
  stim_length: z.coerce.number().int().positive().default(10),
  time_target: z.coerce.number().positive().default(1),
  time_cross: z.coerce.number().positive().default(0.5),
  time_flash: z.coerce.number().positive().default(0.25),
};

const fitsAlphabet = (p: { stim_length: number; alphabet: string[] }) => p.stim_length <= p.alphabet.length;
const fitsAlphabetMessage = { message: 'stim_length cannot exceed the alphabet size', path: ['stim_length'] };

export const rsvpCalibrationParametersSchema = z.object({
  ...rsvpShape,
  stim_number: z.coerce.number().int().positive().default(10),
}).refine(fitsAlphabet, fitsAlphabetMessage);

export const rsvpCopyPhraseParametersSchema = z.object({
  ...rsvpShape,
  text_task: z.string().min(1).default('I_LOVE_COOKIES'),
  spelled_text: z.string().default('I_LOVE_'),
  min_num_seq: z.coerce.number().int().positive().default(1),
  max_inquiries: z.coerce.number().int().positive().default(50),
})
  .refine(fitsAlphabet, fitsAlphabetMessage)
  .refine(p => p.text_task.startsWith(p.spelled_text), {
    message: 'spelled_text must be a prefix of text_task',
    path: ['spelled_text'],
  })
  .refine(p => [...p.text_task].every(symbol => p.alphabet.includes(symbol)), {
    message: 'text_task contains symbols outside the alphabet',
    path: ['text_task'],
  });

export type RsvpParameters = z.infer<z.ZodObject<typeof rsvpShape>>;
export type RsvpCalibrationParameters = z.infer<typeof rsvpCalibrationParametersSchema>;
export type RsvpCopyPhraseParameters = z.infer<typeof rsvpCopyPhraseParametersSchema>;
