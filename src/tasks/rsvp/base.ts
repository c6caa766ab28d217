import { EventEmitter } from 'eventemitter3';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { nanoid } from 'nanoid';
import type { z } from 'zod';
import type {
  DataAcquisitionClient,
  Display,
  InquiryRecord,
  Stimulus,
  TaskParameters,
  TaskSummary,
  TaskSummaryBase,
  Trigger,
  TriggerType,
} from '../../shared/types/index.js';
import { TaskParameterError } from '../../shared/errors.js';
import { createLogger, type ComponentLogger } from '../../shared/utils/logger.js';
import { MonotonicClock, Stopwatch, formatDuration, type Clock } from '../../shared/utils/timer.js';
import { taskTypeLabel, type TaskType } from '../../orchestrator/task-type.js';
import { CALIBRATION_TRIGGER, TRIGGER_FILENAME, writeTriggers } from '../triggers.js';
import { FIXATION_CHAR, type Random } from './stimuli.js';
import type { RsvpParameters } from './parameters.js';

export const SESSION_FILENAME = 'session.json';

export type TaskEvents = {
  'inquiry:start': (inquiry: InquiryRecord) => void;
  'inquiry:end': (inquiry: InquiryRecord) => void;
  'selection': (symbol: string, typedText: string) => void;
  'complete': (summary: TaskSummary) => void;
};

export interface TaskOptions {
  clock?: Clock;
  random?: Random;
}

export function parseParameters<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  parameters: TaskParameters,
  label: string
): T {
  const result = schema.safeParse(parameters);
  if (!result.success) {
    throw new TaskParameterError(
      label,
      result.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}

/**
 * Session lifecycle shared by the RSVP tasks.
 *
 * Subclasses supply the inquiry loop (`run`) and the summary shape; this class
 * owns acquisition start/stop, the trigger log and the files written to the
 * save path.
 */
export abstract class BaseRsvpTask<
  TParams extends RsvpParameters,
  TSummary extends TaskSummary
> extends EventEmitter<TaskEvents> {
  readonly sessionId: string = nanoid(10);
  readonly label: string;

  protected readonly params: TParams;
  protected readonly clock: Clock;
  protected readonly random: Random;
  protected readonly log: ComponentLogger;
  protected readonly triggers: Trigger[] = [];
  protected readonly inquiries: InquiryRecord[] = [];

  constructor(
    protected readonly daq: DataAcquisitionClient,
    protected readonly display: Display,
    readonly taskType: TaskType,
    schema: z.ZodType<TParams, z.ZodTypeDef, unknown>,
    parameters: TaskParameters,
    protected readonly fileSavePath: string,
    options: TaskOptions = {}
  ) {
    super();
    this.label = taskTypeLabel(taskType);
    this.params = parseParameters(schema, parameters, this.label);
    this.clock = options.clock ?? new MonotonicClock();
    this.random = options.random ?? Math.random;
    this.log = createLogger('RsvpTask');
  }

  protected abstract run(): Promise<void>;

  protected abstract summarize(session: TaskSummaryBase): TSummary;

  async execute(): Promise<TSummary> {
    const startedAt = new Date().toISOString();
    const stopwatch = new Stopwatch();

    await mkdir(this.fileSavePath, { recursive: true });
    this.log.task(this.label, 'Starting session', { sessionId: this.sessionId, fileSavePath: this.fileSavePath });

    stopwatch.start();
    await this.daq.startAcquisition();
    let calibrationOffset = 0;
    let failed = false;
    try {
      this.clock.reset();
      this.mark(CALIBRATION_TRIGGER, 'calib');
      calibrationOffset = this.daq.markCalibration();
      await this.run();
    } catch (error) {
      failed = true;
      this.log.error(`${this.label} session failed`, {
        sessionId: this.sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      await this.releaseHandles(failed);
    }
    const durationMs = stopwatch.stop();

    await writeTriggers(join(this.fileSavePath, TRIGGER_FILENAME), this.triggers);

    const summary = this.summarize({
      sessionId: this.sessionId,
      label: this.label,
      fileSavePath: this.fileSavePath,
      startedAt,
      durationMs,
      inquiries: [...this.inquiries],
      samplesAcquired: this.daq.getDataLength(),
      calibrationOffset,
    });
    await writeFile(join(this.fileSavePath, SESSION_FILENAME), JSON.stringify(summary, null, 2), 'utf-8');

    this.log.task(this.label, `Session complete in ${formatDuration(durationMs)}`, {
      sessionId: this.sessionId,
      inquiries: summary.inquiries.length,
    });
    this.emit('complete', summary);
    return summary;
  }

  // Both handles are always released; a release failure only surfaces when the session itself succeeded
  private async releaseHandles(sessionFailed: boolean): Promise<void> {
    const results = await Promise.allSettled([this.daq.stopAcquisition(), this.display.clear()]);
    const failures: unknown[] = results.flatMap(result => (result.status === 'rejected' ? [result.reason] : []));

    for (const failure of failures) {
      this.log.error(`${this.label} could not release its handles`, {
        sessionId: this.sessionId,
        error: failure instanceof Error ? failure.message : String(failure),
      });
    }
    if (!sessionFailed && failures.length > 0) {
      throw failures[0];
    }
  }

  // Prompt (optional), fixation, then each symbol; every flash is a trigger
  protected async presentInquiry(target: string, symbols: string[], showPrompt: boolean): Promise<InquiryRecord> {
    const inquiry: InquiryRecord = { index: this.inquiries.length, target, symbols };
    this.emit('inquiry:start', inquiry);

    if (showPrompt) {
      await this.flash({ symbol: target, kind: 'prompt', durationMs: this.params.time_target * 1000 }, 'first_pres_target');
    }
    await this.flash({ symbol: FIXATION_CHAR, kind: 'fixation', durationMs: this.params.time_cross * 1000 }, 'fixation');
    for (const symbol of symbols) {
      await this.flash(
        { symbol, kind: 'symbol', durationMs: this.params.time_flash * 1000 },
        symbol === target ? 'target' : 'nontarget'
      );
    }

    this.inquiries.push(inquiry);
    this.emit('inquiry:end', inquiry);
    return inquiry;
  }

  private async flash(stimulus: Stimulus, type: TriggerType): Promise<void> {
    this.mark(stimulus.symbol, type);
    await this.display.present(stimulus);
  }

  private mark(symbol: string, type: TriggerType): void {
    this.triggers.push({ symbol, type, timestamp: this.clock.getTime() });
  }
}

export type RsvpTask = BaseRsvpTask<RsvpParameters, TaskSummary>;
