import { z } from 'zod';
import { InvalidTaskTypeError, UnregisteredTaskError } from '../shared/errors.js';

// Supported modes and, per mode, the experiment types it offers.
// A new mode starts here; its implementations go in the task registry.
export const TASK_MODES = {
  RSVP: ['Calibration', 'Copy Phrase'],
} as const satisfies Record<string, readonly string[]>;

export type TaskMode = keyof typeof TASK_MODES;

export type ExperimentType<M extends TaskMode = TaskMode> = (typeof TASK_MODES)[M][number];

export type TaskType = {
  [M in TaskMode]: { readonly mode: M; readonly experimentType: ExperimentType<M> };
}[TaskMode];

// Shape of a task type before validation (CLI flags, JSON)
export interface TaskTypeDescriptor {
  readonly mode: string;
  readonly experimentType: string;
}

const taskTypeDescriptorSchema = z.object({
  mode: z.string().trim().min(1, 'mode is required'),
  experimentType: z.string().trim().min(1, 'experimentType is required'),
});

export function isTaskMode(value: string): value is TaskMode {
  return Object.prototype.hasOwnProperty.call(TASK_MODES, value);
}

export function isExperimentTypeOf(mode: TaskMode, value: string): value is ExperimentType {
  const known: readonly string[] = TASK_MODES[mode];
  return known.includes(value);
}

export function parseTaskType(input: unknown): TaskType {
  const parsed = taskTypeDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(issue => issue.message).join(', ');
    throw new InvalidTaskTypeError(`Malformed task type: ${detail}`);
  }

  const { mode, experimentType } = parsed.data;
  if (!isTaskMode(mode)) {
    throw new UnregisteredTaskError(mode, experimentType, 'unknown-mode');
  }
  if (!isExperimentTypeOf(mode, experimentType)) {
    throw new UnregisteredTaskError(mode, experimentType, 'unknown-experiment-type');
  }

  return { mode, experimentType };
}

export function taskTypeLabel(taskType: TaskTypeDescriptor): string {
  return `${taskType.mode} ${taskType.experimentType}`;
}
