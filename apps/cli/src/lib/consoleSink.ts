/**
 * Console progress sink: coloured lines on stdout/stderr, with an ora
 * spinner standing in for the progress bar.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { ProgressSink } from '@reelkeeper/core';

export class ConsoleSink implements ProgressSink {
  private readonly spinner: Ora;

  constructor(private readonly showCommands: boolean = true) {
    this.spinner = ora({ discardStdin: false });
  }

  writeInfo(_channel: number, text: string): void {
    this.print(() => console.log(text));
  }

  writeError(_channel: number, text: string): void {
    this.print(() => console.error(chalk.red(text)));
  }

  writeCommand(_channel: number, text: string): void {
    if (!this.showCommands) return;
    this.print(() => console.log(chalk.gray(`$ ${text}`)));
  }

  updateProgress(label: string, done: number, total: number): void {
    const text = `${chalk.cyan(`${done}/${total}`)} ${label}`;
    if (done >= total) {
      this.spinner.stop();
      return;
    }
    if (this.spinner.isSpinning) {
      this.spinner.text = text;
    } else {
      this.spinner.start(text);
    }
  }

  /** Stop the spinner for good */
  close(): void {
    this.spinner.stop();
  }

  private print(write: () => void): void {
    if (!this.spinner.isSpinning) {
      write();
      return;
    }
    this.spinner.clear();
    write();
    this.spinner.render();
  }
}
