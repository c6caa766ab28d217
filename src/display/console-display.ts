import chalk from 'chalk';
import { setTimeout as sleep } from 'timers/promises';
import type { Display, Stimulus } from '../shared/types/index.js';

export type DisplayOutput = Pick<NodeJS.WritableStream, 'write'>;

export interface ConsoleDisplayOptions {
  output?: DisplayOutput;
  wait?: (ms: number) => Promise<unknown>;
}

const styles: Record<Stimulus['kind'], (text: string) => string> = {
  prompt: text => chalk.bold.green(text),
  fixation: text => chalk.gray(text),
  symbol: text => chalk.bold.white(text),
};

// Terminal presentation: one line per stimulus, held for its duration
export class ConsoleDisplay implements Display {
  private readonly output: DisplayOutput;
  private readonly wait: (ms: number) => Promise<unknown>;

  constructor(options: ConsoleDisplayOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.wait = options.wait ?? sleep;
  }

  async present(stimulus: Stimulus): Promise<void> {
    this.output.write(`  ${styles[stimulus.kind](stimulus.symbol)}\n`);
    await this.wait(stimulus.durationMs);
  }

  async showText(text: string): Promise<void> {
    this.output.write(`${chalk.cyan(text)}\n`);
  }

  async clear(): Promise<void> {
    this.output.write('\n');
  }
}
