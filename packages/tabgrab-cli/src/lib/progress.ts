import ora, { type Ora } from "ora";

/**
 * Progress for a batch of targets, drawn on stderr so stdout only carries
 * status lines.
 */
export interface Progress {
  /** Show `text` for the item at `index` (0-based) */
  update(index: number, text: string): void;
  stop(): void;
}

export function formatProgressText(index: number, total: number, text: string): string {
  return total > 1 ? `[${index + 1}/${total}] ${text}` : text;
}

class SilentProgress implements Progress {
  update(): void {}

  stop(): void {}
}

class SpinnerProgress implements Progress {
  private readonly spinner: Ora;

  constructor(private readonly total: number) {
    // stdin may still be needed by a later prompt or piped read
    this.spinner = ora({ stream: process.stderr, discardStdin: false });
  }

  update(index: number, text: string): void {
    const label = formatProgressText(index, this.total, text);
    if (this.spinner.isSpinning) {
      this.spinner.text = label;
    } else {
      this.spinner.start(label);
    }
  }

  stop(): void {
    this.spinner.stop();
  }
}

/**
 * Spinner for `total` items, or a no-op in quiet, JSON and interactive runs.
 */
export function createProgress(total: number, silent: boolean): Progress {
  return silent ? new SilentProgress() : new SpinnerProgress(total);
}
