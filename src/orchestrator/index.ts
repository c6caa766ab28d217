export { TaskDispatcher } from './task-dispatcher.js';
export { TaskRegistry, createTaskRegistry } from './task-registry.js';
export type { TaskEntryPoint, TaskRegistration } from './task-registry.js';
export { TASK_MODES, isTaskMode, isExperimentTypeOf, parseTaskType, taskTypeLabel } from './task-type.js';
export type { TaskMode, ExperimentType, TaskType, TaskTypeDescriptor } from './task-type.js';
export { defaultSavePath, loadParameters } from './session-files.js';
