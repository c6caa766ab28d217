import type { TaskSummary } from '../shared/types/index.js';
import { createTaskRegistry, type TaskEntryPoint, type TaskRegistry } from '../orchestrator/task-registry.js';
import type { RsvpTask } from './rsvp/base.js';
import { RsvpCalibrationTask } from './rsvp/calibration.js';
import { RsvpCopyPhraseTask } from './rsvp/copy-phrase.js';

export { BaseRsvpTask, SESSION_FILENAME, parseParameters } from './rsvp/base.js';
export type { RsvpTask, TaskEvents, TaskOptions } from './rsvp/base.js';
export { RsvpCalibrationTask } from './rsvp/calibration.js';
export { RsvpCopyPhraseTask, progressText } from './rsvp/copy-phrase.js';
export { DEFAULT_ALPHABET, BACKSPACE_CHAR, SPACE_CHAR, FIXATION_CHAR } from './rsvp/stimuli.js';
export { TRIGGER_FILENAME, formatTriggers, presentedLetters } from './triggers.js';

export interface DefaultRegistryOptions {
  // Called with each task before it starts, e.g. to follow its events
  observe?: (task: RsvpTask) => void;
}

export function createDefaultTaskRegistry(
  options: DefaultRegistryOptions = {}
): TaskRegistry<Promise<TaskSummary>> {
  const rsvpCalibration: TaskEntryPoint<Promise<TaskSummary>> = async (daq, display, taskType, parameters, fileSavePath) => {
    const task = new RsvpCalibrationTask(daq, display, taskType, parameters, fileSavePath);
    options.observe?.(task);
    return task.execute();
  };

  const rsvpCopyPhrase: TaskEntryPoint<Promise<TaskSummary>> = async (daq, display, taskType, parameters, fileSavePath) => {
    const task = new RsvpCopyPhraseTask(daq, display, taskType, parameters, fileSavePath);
    options.observe?.(task);
    return task.execute();
  };

  return createTaskRegistry([
    { taskType: { mode: 'RSVP', experimentType: 'Calibration' }, entryPoint: rsvpCalibration },
    { taskType: { mode: 'RSVP', experimentType: 'Copy Phrase' }, entryPoint: rsvpCopyPhrase },
  ]);
}
