/**
 * CLI Progress Display
 *
 * Renders a spinner and progress bar for an Observable-driven task.
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
 * Subscribe to `source`, drawing progress on stderr, and resolve with the
 * last value it emitted.
 */
export function runWithProgress<T>(
  source: Observable<T>,
  mapper: (value: T) => { current: number; total: number },
  options: ProgressOptions
): Promise<T> {
  const {
    label,
    unit = "chunks",
    barWidth = 20,
    stream = process.stderr,
  } = options;

  let current = 0;
  let total = 0;
  let frame = 0;
  let last: { value: T } | null = null;

  function render(spinner: string) {
    const filled = total > 0 ? Math.round((current / total) * barWidth) : 0;
    const bar = "█".repeat(filled) + "░".repeat(barWidth - filled);
    stream.write(`\r${spinner} ${label}  ${bar}  ${current}/${total} ${unit}`);
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setInterval(() => {
      render(SPINNER_FRAMES[frame % SPINNER_FRAMES.length]);
      frame++;
    }, 80);

    source.subscribe({
      next(value) {
        const progress = mapper(value);
        current = progress.current;
        total = progress.total;
        last = { value };
      },
      error(err: unknown) {
        clearInterval(timer);
        stream.write(`\n✗ ${label}\n`);
        reject(err);
      },
      complete() {
        clearInterval(timer);
        stream.write(`\r✔ ${label}  ${"█".repeat(barWidth)}  ${current}/${total} ${unit}\n`);
        if (last) resolve(last.value);
        else reject(new Error(`${label} finished without a result`));
      },
    });
  });
}
