/**
 * Per-user progress for the report commands
 * Progress bar on interactive terminals, throttled text lines otherwise
 */

import cliProgress from 'cli-progress';
import chalk from 'chalk';

export class ProgressUI {
  private bar: cliProgress.SingleBar | null = null;
  private readonly isInteractive: boolean;
  private startTime: number = Date.now();
  private lastProgressUpdate: number = 0;
  private readonly progressUpdateInterval: number = 2000;

  constructor(private readonly label: string, private readonly quiet: boolean = false) {
    this.isInteractive = Boolean(process.stdout.isTTY) && !quiet && !process.env.NO_COLOR && !process.env.CI;
  }

  /**
   * Per-user log lines would tear through the bar, so callers keep
   * step logging for non-interactive runs only.
   */
  get interactive(): boolean {
    return this.isInteractive;
  }

  start(total: number): void {
    this.startTime = Date.now();
    this.lastProgressUpdate = this.startTime;

    if (!this.isInteractive) {
      if (!this.quiet) {
        console.log(`${this.label}: ${total} users to process\n`);
      }
      return;
    }

    this.bar = new cliProgress.SingleBar({
      format: `${chalk.bold.cyan(this.label)} |{bar}| {percentage}% | {value}/{total} users {eta_formatted}`,
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true
    }, cliProgress.Presets.shades_classic);
    this.bar.start(total, 0);
  }

  update(processed: number, total: number): void {
    if (this.bar) {
      this.bar.update(processed);
      return;
    }
    if (this.quiet) return;

    const now = Date.now();
    if (now - this.lastProgressUpdate >= this.progressUpdateInterval || processed === total) {
      const elapsed = (now - this.startTime) / 1000;
      const throughput = elapsed > 0 ? processed / elapsed : 0;
      console.log(`Progress: ${processed}/${total} users (${throughput.toFixed(1)} users/sec)`);
      this.lastProgressUpdate = now;
    }
  }

  stop(): void {
    if (this.bar) {
      this.bar.stop();
      this.bar = null;
      // Reset colors so the summary does not inherit the bar's
      process.stdout.write('\x1b[0m\n');
    }
  }
}
