/**
 * Progress Indicator Utilities
 *
 * Spinner for long-running commands. Draws on stderr so stdout carries only
 * the command result, and stays quiet when stderr is not a terminal.
 */

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export interface ProgressStream {
  isTTY?: boolean;
  columns?: number;
  write(chunk: string): boolean;
}

/**
 * Progress indicator class for showing loading states
 */
export class ProgressIndicator {
  private interval: NodeJS.Timeout | null = null;
  private frameIndex = 0;
  private message = '';
  private isActive = false;

  constructor(private readonly stream: ProgressStream = process.stderr) {}

  /**
   * Start showing a spinner with a message
   */
  start(message: string): void {
    if (this.isActive) {
      this.stop();
    }

    this.message = message;
    if (!this.stream.isTTY) {
      return;
    }
    this.isActive = true;
    this.frameIndex = 0;

    this.update();

    this.interval = setInterval(() => {
      this.frameIndex = (this.frameIndex + 1) % SPINNER_FRAMES.length;
      this.update();
    }, 100);
    // never keep the process alive for the spinner alone
    this.interval.unref();
  }

  private update(): void {
    if (!this.isActive) return;
    const frame = SPINNER_FRAMES[this.frameIndex];
    this.stream.write(`\r${frame} ${this.message}`);
  }

  /**
   * Update the message while keeping spinner running
   */
  updateMessage(message: string): void {
    this.message = message;
    if (this.isActive) {
      this.update();
    }
  }

  getMessage(): string {
    return this.message;
  }

  /**
   * Stop the spinner and clear the line
   */
  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    if (this.isActive) {
      this.stream.write('\r' + ' '.repeat(this.stream.columns || 80) + '\r');
      this.isActive = false;
    }
  }

  /**
   * Show a success message and stop
   */
  succeed(message?: string): void {
    this.stop();
    if (message) {
      this.stream.write(`✓ ${message}\n`);
    }
  }

  /**
   * Show a failure message and stop
   */
  fail(message?: string): void {
    this.stop();
    if (message) {
      this.stream.write(`✗ ${message}\n`);
    }
  }
}

/**
 * Format elapsed time
 */
export function formatElapsedTime(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

let globalProgress: ProgressIndicator | null = null;

/**
 * Get or create global progress indicator
 */
export function getProgressIndicator(): ProgressIndicator {
  if (!globalProgress) {
    globalProgress = new ProgressIndicator();
  }
  return globalProgress;
}

/**
 * Reset global progress indicator
 */
export function resetProgressIndicator(): void {
  if (globalProgress) {
    globalProgress.stop();
    globalProgress = null;
  }
}
