export * from './orchestrator/index.js';
export * from './tasks/index.js';
export { SimulatedAcquisitionClient } from './acquisition/simulated-client.js';
export type { SimulatedAcquisitionOptions } from './acquisition/simulated-client.js';
export { ConsoleDisplay } from './display/console-display.js';
export type { ConsoleDisplayOptions, DisplayOutput } from './display/console-display.js';
export { UnregisteredTaskError, InvalidTaskTypeError, TaskParameterError, CliUsageError } from './shared/errors.js';
export type { UnregisteredReason } from './shared/errors.js';
export { config, validateConfig } from './shared/config.js';
export { createLogger } from './shared/utils/logger.js';
export type { ComponentLogger } from './shared/utils/logger.js';
export type * from './shared/types/index.js';
