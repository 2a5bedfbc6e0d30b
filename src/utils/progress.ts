/**
 * Single-line progress display for interactive terminals.
 * Shows a spinner with the number of files checked, updated in place.
 */

import type { MessageStream } from '../reporter/logger.js';

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

// ANSI codes
const CYAN = '\x1b[36m';
const DIM = '\x1b[2m';
const RESET = '\x1b[0m';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';
const CLEAR_LINE = '\r\x1b[2K';

export class ProgressDisplay {
  private done = 0;
  private total = 0;
  private current = '';
  private spinnerFrame = 0;
  private interval: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly stream: MessageStream = process.stderr) {}

  /** Start the display for `total` files */
  start(total: number): void {
    this.total = total;
    this.stream.write(HIDE_CURSOR);
    this.render();
    this.interval = setInterval(() => {
      this.spinnerFrame = (this.spinnerFrame + 1) % SPINNER_FRAMES.length;
      this.render();
    }, 80);
  }

  /** Record one finished file */
  advance(path: string): void {
    this.done++;
    this.current = path;
  }

  /** Stop and clear the line */
  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    this.stream.write(CLEAR_LINE + SHOW_CURSOR);
  }

  /** Text of the progress line without escape codes */
  describe(): string {
    const suffix = this.current ? ` ${this.current}` : '';
    return `checked ${this.done}/${this.total}${suffix}`;
  }

  private render(): void {
    const frame = `${CYAN}${SPINNER_FRAMES[this.spinnerFrame]}${RESET}`;
    this.stream.write(`${CLEAR_LINE}${frame} ${DIM}${this.describe()}${RESET}`);
  }
}
