export type UnregisteredReason = 'unknown-mode' | 'unknown-experiment-type';

export class UnregisteredTaskError extends Error {
  readonly mode: string;
  readonly experimentType: string;
  readonly reason: UnregisteredReason;

  constructor(mode: string, experimentType: string, reason: UnregisteredReason) {
    super(
      reason === 'unknown-mode'
        ? `Mode "${mode}" is not implemented (requested experiment type "${experimentType}")`
        : `Experiment type "${experimentType}" is not implemented for mode "${mode}"`
    );
    this.name = 'UnregisteredTaskError';
    this.mode = mode;
    this.experimentType = experimentType;
    this.reason = reason;
  }
}

export class InvalidTaskTypeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTaskTypeError';
  }
}

export class TaskParameterError extends Error {
  readonly issues: string[];

  constructor(label: string, issues: string[]) {
    super(`Invalid parameters for ${label}: ${issues.join('; ')}`);
    this.name = 'TaskParameterError';
    this.issues = issues;
  }
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}
