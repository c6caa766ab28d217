import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { TaskParameters } from '../shared/types/index.js';
import type { TaskType } from './task-type.js';

const parametersFileSchema = z.record(z.unknown());

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read a JSON parameters file into a flat key/value map.
 *
 * With `optional` set, a missing file yields an empty map so tasks fall back
 * to their defaults.
 */
export async function loadParameters(path: string, optional = false): Promise<TaskParameters> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (optional && isMissingFile(error)) return {};
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Parameters file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = parametersFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Parameters file ${path} must contain a JSON object`);
  }
  return result.data;
}

// data/RSVP_Copy_Phrase_2026-01-02T03-04-05
export function defaultSavePath(root: string, taskType: TaskType, now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/\.\d{3}Z$/, '').replace(/:/g, '-');
  const name = `${taskType.mode}_${taskType.experimentType}`.replace(/\s+/g, '_');
  return join(root, `${name}_${stamp}`);
}
