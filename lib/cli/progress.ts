/**
 * CLI progress display: a spinner and progress bar on stderr driven by an
 * Observable of progress events.
 */

import type { Observable } from "rxjs";

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

export interface ProgressOptions {
  label: string;
  unit?: string;
  barWidth?: number;
  stream?: NodeJS.WritableStream;
}

/**
 * Subscribe to `source`, render progress until it completes and resolve
 * with the last emitted value.
 */
export function runWithProgress<T>(
  source: Observable<T>,
  mapper: (value: T) => { current: number; total: number },
  options: ProgressOptions
): Promise<T | undefined> {
  const {
    label,
    unit = "images",
    barWidth = 20,
    stream = process.stderr,
  } = options;

  let current = 0;
  let total = 0;
  let frame = 0;
  let last: T | undefined;

  function render(spinner: string) {
    const filled = total > 0 ? Math.round((current / total) * barWidth) : 0;
    const empty = barWidth - filled;
    const bar = "█".repeat(filled) + "░".repeat(empty);
    const line = `${spinner} ${label}  ${bar}  ${current}/${total} ${unit}`;
    stream.write(`\r${line}`);
  }

  return new Promise<T | undefined>((resolve, reject) => {
    const timer = setInterval(() => {
      render(SPINNER_FRAMES[frame % SPINNER_FRAMES.length]);
      frame++;
    }, 80);

    source.subscribe({
      next(value) {
        last = value;
        const progress = mapper(value);
        current = progress.current;
        total = progress.total;
      },
      error(err) {
        clearInterval(timer);
        stream.write("\n");
        stream.write(`✗ ${label}  ${err instanceof Error ? err.message : String(err)}\n`);
        reject(err);
      },
      complete() {
        clearInterval(timer);
        const filled = "█".repeat(barWidth);
        stream.write(`\r✔ ${label}  ${filled}  ${current}/${total} ${unit}\n`);
        resolve(last);
      },
    });
  });
}

export function parseFlags(args: string[]): { config?: string } {
  let config: string | undefined;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--config" && args[i + 1]) {
      config = args[++i];
    }
  }
  return { config };
}
