import type {
  CalibrationSummary,
  DataAcquisitionClient,
  Display,
  TaskParameters,
  TaskSummaryBase,
} from '../../shared/types/index.js';
import type { TaskType } from '../../orchestrator/task-type.js';
import { BaseRsvpTask, type TaskOptions } from './base.js';
import { rsvpCalibrationParametersSchema, type RsvpCalibrationParameters } from './parameters.js';
import { calibrationInquiry } from './stimuli.js';

// Shows `stim_number` inquiries, each introduced by its target symbol.
export class RsvpCalibrationTask extends BaseRsvpTask<RsvpCalibrationParameters, CalibrationSummary> {
  constructor(
    daq: DataAcquisitionClient,
    display: Display,
    taskType: TaskType,
    parameters: TaskParameters,
    fileSavePath: string,
    options: TaskOptions = {}
  ) {
    super(daq, display, taskType, rsvpCalibrationParametersSchema, parameters, fileSavePath, options);
  }

  protected async run(): Promise<void> {
    const { alphabet, stim_length, stim_number } = this.params;
    for (let i = 0; i < stim_number; i++) {
      const { target, symbols } = calibrationInquiry(alphabet, stim_length, this.random);
      await this.presentInquiry(target, symbols, true);
    }
  }

  protected summarize(session: TaskSummaryBase): CalibrationSummary {
    return { kind: 'calibration', ...session };
  }
}
