import type {
  CopyPhraseSummary,
  DataAcquisitionClient,
  Display,
  TaskParameters,
  TaskSummaryBase,
} from '../../shared/types/index.js';
import type { TaskType } from '../../orchestrator/task-type.js';
import { presentedLetters } from '../triggers.js';
import { BaseRsvpTask, type TaskOptions } from './base.js';
import { rsvpCopyPhraseParametersSchema, type RsvpCopyPhraseParameters } from './parameters.js';
import { inquiryWithTarget } from './stimuli.js';

export function progressText(taskText: string, typedText: string): string {
  return `${taskText} | ${typedText}`;
}

/**
 * Copy phrase in simulation: every inquiry shows the next letter of
 * `text_task`, and the letter is typed once it has been shown in
 * `min_num_seq` inquiries. No EEG evidence is decoded.
 */
export class RsvpCopyPhraseTask extends BaseRsvpTask<RsvpCopyPhraseParameters, CopyPhraseSummary> {
  private typedText: string;

  constructor(
    daq: DataAcquisitionClient,
    display: Display,
    taskType: TaskType,
    parameters: TaskParameters,
    fileSavePath: string,
    options: TaskOptions = {}
  ) {
    super(daq, display, taskType, rsvpCopyPhraseParametersSchema, parameters, fileSavePath, options);
    this.typedText = this.params.spelled_text;
  }

  protected async run(): Promise<void> {
    const { alphabet, stim_length, text_task, min_num_seq, max_inquiries } = this.params;
    let shownForLetter = 0;

    await this.display.showText(progressText(text_task, this.typedText));

    while (this.typedText !== text_task && this.inquiries.length < max_inquiries) {
      const target = text_task[this.typedText.length];
      const firstTrigger = this.triggers.length;

      await this.presentInquiry(target, inquiryWithTarget(alphabet, stim_length, target, this.random), false);

      const letters = presentedLetters(this.triggers.slice(firstTrigger), alphabet);
      if (letters.includes(target)) {
        shownForLetter++;
      }
      if (shownForLetter >= min_num_seq) {
        this.typedText += target;
        shownForLetter = 0;
        this.emit('selection', target, this.typedText);
        await this.display.showText(progressText(text_task, this.typedText));
      }
    }

    if (this.typedText !== text_task) {
      this.log.warn(`${this.label} stopped after ${max_inquiries} inquiries`, { typedText: this.typedText });
    }
  }

  protected summarize(session: TaskSummaryBase): CopyPhraseSummary {
    return {
      kind: 'copy-phrase',
      ...session,
      taskText: this.params.text_task,
      typedText: this.typedText,
      completed: this.typedText === this.params.text_task,
    };
  }
}
