import type { DataAcquisitionClient, Display, TaskParameters } from '../shared/types/index.js';
import { UnregisteredTaskError } from '../shared/errors.js';
import { createLogger } from '../shared/utils/logger.js';
import type { TaskEntryPoint, TaskRegistry } from './task-registry.js';
import { taskTypeLabel, type TaskType } from './task-type.js';

const log = createLogger('TaskDispatcher');

/**
 * Routes one request to the entry point registered for its task type.
 *
 * Holds nothing between calls beyond the registry it was built with. The
 * entry point's return value and any error it throws reach the caller as-is.
 */
export class TaskDispatcher<TResult = unknown> {
  constructor(private readonly registry: TaskRegistry<TResult>) {}

  dispatch(
    daq: DataAcquisitionClient,
    display: Display,
    taskType: TaskType,
    parameters: TaskParameters,
    fileSavePath: string
  ): TResult {
    const label = taskTypeLabel(taskType);

    let entryPoint: TaskEntryPoint<TResult>;
    try {
      entryPoint = this.registry.resolve(taskType);
    } catch (error) {
      if (error instanceof UnregisteredTaskError) {
        log.warn(`No task registered for ${label}`, { reason: error.reason });
      }
      throw error;
    }

    log.task(label, 'Dispatching task', { fileSavePath });
    return entryPoint(daq, display, taskType, parameters, fileSavePath);
  }
}
