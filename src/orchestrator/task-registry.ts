import type { DataAcquisitionClient, Display, TaskParameters } from '../shared/types/index.js';
import { UnregisteredTaskError } from '../shared/errors.js';
import { taskTypeLabel, type TaskType, type TaskTypeDescriptor } from './task-type.js';

// What a registered task receives: every dispatch input, untouched.
export type TaskEntryPoint<TResult = unknown> = (
  daq: DataAcquisitionClient,
  display: Display,
  taskType: TaskType,
  parameters: TaskParameters,
  fileSavePath: string
) => TResult;

export interface TaskRegistration<TResult = unknown> {
  taskType: TaskType;
  entryPoint: TaskEntryPoint<TResult>;
}

/**
 * Immutable mode -> experiment type -> entry point table.
 *
 * Built once from its registrations and handed to a dispatcher. New modes
 * and experiment types are added as registrations; lookup never changes.
 */
export class TaskRegistry<TResult = unknown> {
  private readonly modes: ReadonlyMap<string, ReadonlyMap<string, TaskEntryPoint<TResult>>>;
  private readonly registered: readonly TaskType[];

  constructor(registrations: readonly TaskRegistration<TResult>[]) {
    const modes = new Map<string, Map<string, TaskEntryPoint<TResult>>>();

    for (const { taskType, entryPoint } of registrations) {
      let experiments = modes.get(taskType.mode);
      if (!experiments) {
        experiments = new Map();
        modes.set(taskType.mode, experiments);
      }
      if (experiments.has(taskType.experimentType)) {
        throw new Error(`Duplicate registration for ${taskTypeLabel(taskType)}`);
      }
      experiments.set(taskType.experimentType, entryPoint);
    }

    this.modes = modes;
    this.registered = Object.freeze(registrations.map(({ taskType }) => taskType));
    Object.freeze(this);
  }

  get size(): number {
    return this.registered.length;
  }

  // Look up the entry point for a task type, or fail naming what is missing
  resolve(taskType: TaskTypeDescriptor): TaskEntryPoint<TResult> {
    const experiments = this.modes.get(taskType.mode);
    if (!experiments) {
      throw new UnregisteredTaskError(taskType.mode, taskType.experimentType, 'unknown-mode');
    }
    const entryPoint = experiments.get(taskType.experimentType);
    if (!entryPoint) {
      throw new UnregisteredTaskError(taskType.mode, taskType.experimentType, 'unknown-experiment-type');
    }
    return entryPoint;
  }

  has(taskType: TaskTypeDescriptor): boolean {
    return this.modes.get(taskType.mode)?.has(taskType.experimentType) ?? false;
  }

  taskTypes(): TaskType[] {
    return [...this.registered];
  }
}

export function createTaskRegistry<TResult>(
  registrations: readonly TaskRegistration<TResult>[]
): TaskRegistry<TResult> {
  return new TaskRegistry(registrations);
}
