/**
 * @fileoverview Progress indicators for CLI operations
 *
 * Indicators draw on stderr, and only when it is a terminal, so stdout
 * carries nothing but command output.
 */

import cliProgress from 'cli-progress';

const SPINNER_FRAMES = ['|', '/', '-', '\\'];
const SPINNER_INTERVAL_MS = 100;

export interface SpinnerHandle {
  succeed(message: string): void;
  fail(message: string): void;
}

const SILENT_SPINNER: SpinnerHandle = {
  succeed: () => undefined,
  fail: () => undefined,
};

/** Spinner for a single long wait, such as one refinement loop run. */
export function createSpinner(message: string, stream: NodeJS.WriteStream = process.stderr): SpinnerHandle {
  if (!stream.isTTY) {
    return SILENT_SPINNER;
  }

  let frame = 0;
  const draw = (): void => {
    stream.write(`\r${SPINNER_FRAMES[frame % SPINNER_FRAMES.length]} ${message}`);
    frame += 1;
  };
  draw();
  const timer = setInterval(draw, SPINNER_INTERVAL_MS);

  const finish = (status: string, text: string): void => {
    clearInterval(timer);
    stream.write(`\r${' '.repeat(message.length + 2)}\r[${status}] ${text}\n`);
  };
  return {
    succeed: (text) => finish('OK', text),
    fail: (text) => finish('FAIL', text),
  };
}

export interface ProgressBarHandle {
  update(current: number, total: number): void;
  stop(): void;
}

/** Bar over paragraphs indexed, created lazily once the total is known. */
export function createIngestProgress(stream: NodeJS.WriteStream = process.stderr): ProgressBarHandle {
  if (!stream.isTTY) {
    return { update: () => undefined, stop: () => undefined };
  }

  let bar: cliProgress.SingleBar | null = null;
  return {
    update(current: number, total: number): void {
      if (!bar) {
        bar = new cliProgress.SingleBar(
          {
            format: '{bar} {percentage}% | {value}/{total} paragraphs | ETA: {eta_formatted}',
            barCompleteChar: '=',
            barIncompleteChar: '-',
            hideCursor: true,
            stream,
          },
          cliProgress.Presets.shades_classic
        );
        bar.start(total, 0);
      }
      bar.update(current);
    },
    stop(): void {
      bar?.stop();
    },
  };
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/** Print aligned `key: value` rows; null renders as N/A. */
export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  const width = Math.max(...items.map((item) => item.key.length));
  for (const { key, value } of items) {
    console.log(`  ${key.padEnd(width)}: ${value === null ? 'N/A' : String(value)}`);
  }
}
