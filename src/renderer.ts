import chalk from 'chalk';
import { describeKind } from './apiErrors';
import type {
  FinishedEvent,
  OverallVerdict,
  TestCaseResult,
  VerdictSnapshot,
  WatchErrorEvent,
  WatchEvent
} from './types';

export interface RenderTarget {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface RendererOptions {
  out: RenderTarget;
  /** Colored output; defaults to whether `out` is a terminal */
  color?: boolean;
  /** Redraw snapshots in place instead of appending; defaults like `color` */
  live?: boolean;
}

export type Tone = 'success' | 'failure' | 'warning' | 'progress';

const VERDICT_LABEL: Record<OverallVerdict, string> = {
  Queued: 'Queued',
  Judging: 'Judging',
  Pending: 'Pending',
  Running: 'Running',
  Accepted: 'Accepted',
  WrongAnswer: 'Wrong Answer',
  TimeLimitExceeded: 'Time Limit Exceeded',
  MemoryLimitExceeded: 'Memory Limit Exceeded',
  RuntimeError: 'Runtime Error',
  CompileError: 'Compile Error',
  SystemError: 'System Error',
  Aborted: 'Aborted'
};

const VERDICT_ICON: Record<OverallVerdict, string> = {
  Queued: '⏳',
  Judging: '⚖️',
  Pending: '⏳',
  Running: '▶️',
  Accepted: '✅',
  WrongAnswer: '❌',
  TimeLimitExceeded: '⏱️',
  MemoryLimitExceeded: '💾',
  RuntimeError: '⚠️',
  CompileError: '🔧',
  SystemError: '💥',
  Aborted: '🛑'
};

const VERDICT_TONE: Record<OverallVerdict, Tone> = {
  Queued: 'progress',
  Judging: 'progress',
  Pending: 'progress',
  Running: 'progress',
  Accepted: 'success',
  WrongAnswer: 'failure',
  TimeLimitExceeded: 'warning',
  MemoryLimitExceeded: 'warning',
  RuntimeError: 'failure',
  CompileError: 'failure',
  SystemError: 'failure',
  Aborted: 'warning'
};

export function formatMemory(memoryKb: number): string {
  if (memoryKb < 1024) {
    return `${memoryKb} KB`;
  }
  return `${(memoryKb / 1024).toFixed(2)} MB`;
}

/**
 * Draws watch events and command output on a terminal
 */
export class TerminalRenderer {
  private readonly out: RenderTarget;
  private readonly live: boolean;
  private readonly style: chalk.Chalk;
  private drawnLines = 0;

  constructor(options: RendererOptions) {
    const interactive = options.out.isTTY === true;
    this.out = options.out;
    this.live = options.live ?? interactive;
    this.style = new chalk.Instance({ level: (options.color ?? interactive) ? 1 : 0 });
  }

  render(event: WatchEvent): void {
    switch (event.type) {
      case 'SnapshotChanged':
        this.redraw(this.formatSnapshot(event.snapshot));
        break;
      case 'Error':
        this.append([this.formatError(event)]);
        break;
      case 'Finished':
        this.append(this.formatFinished(event));
        this.drawnLines = 0;
        break;
    }
  }

  /**
   * Print a snapshot once, outside of a watch
   */
  showSnapshot(snapshot: VerdictSnapshot): void {
    this.write(this.formatSnapshot(snapshot));
  }

  showMessage(message: string, tone?: Tone): void {
    this.write([tone ? this.paint(tone, message) : message]);
  }

  /**
   * Plain aligned table
   */
  showTable(headers: string[], rows: Array<Array<string | number>>): void {
    const cells = rows.map((row) => row.map((cell) => String(cell)));
    const widths = headers.map((header, i) =>
      Math.max(header.length, ...cells.map((row) => (row[i] ?? '').length))
    );

    const line = (row: string[]) =>
      row.map((cell, i) => cell.padEnd(widths[i])).join(' | ').trimEnd();

    const headerRow = line(headers);
    this.write([
      this.style.bold(headerRow),
      '-'.repeat(headerRow.length),
      ...cells.map(line)
    ]);
  }

  formatSnapshot(snapshot: VerdictSnapshot): string[] {
    const lines = [
      `Submission ${snapshot.submissionId}: ${this.formatVerdict(snapshot.overallVerdict)}`
    ];

    if (snapshot.score !== undefined) {
      lines.push(`  Score: ${snapshot.score}`);
    }
    if (snapshot.timeMs !== undefined) {
      lines.push(`  Time: ${snapshot.timeMs} ms`);
    }
    if (snapshot.memoryKb !== undefined) {
      lines.push(`  Memory: ${formatMemory(snapshot.memoryKb)}`);
    }
    if (snapshot.message) {
      lines.push(`  Message: ${snapshot.message}`);
    }

    for (const testCase of snapshot.testCases) {
      lines.push(this.formatTestCase(testCase));
    }

    return lines;
  }

  formatError(event: WatchErrorEvent): string {
    const reason = describeKind(event.kind);
    const text =
      event.attempt < event.maxAttempts
        ? `Retrying after ${reason}, attempt ${event.attempt}/${event.maxAttempts}: ${event.message}`
        : `Giving up after ${reason}, attempt ${event.attempt}/${event.maxAttempts}: ${event.message}`;
    return this.paint('warning', text);
  }

  formatFinished(event: FinishedEvent): string[] {
    switch (event.reason) {
      case 'Terminal': {
        const verdict = event.snapshot ? event.snapshot.overallVerdict : 'SystemError';
        return [`Final verdict: ${this.formatVerdict(verdict)}`];
      }
      case 'Cancelled':
        return [this.paint('warning', `Stopped watching submission ${event.submissionId}.`)];
      case 'Exhausted': {
        const reason = event.cause ? ` (${describeKind(event.cause)})` : '';
        const detail = event.message ? `: ${event.message}` : '';
        return [
          this.paint(
            'failure',
            `Gave up watching submission ${event.submissionId}${reason}${detail}`
          )
        ];
      }
    }
  }

  private formatVerdict(verdict: OverallVerdict): string {
    return `${VERDICT_ICON[verdict]} ${this.paint(VERDICT_TONE[verdict], VERDICT_LABEL[verdict])}`;
  }

  private formatTestCase(testCase: TestCaseResult): string {
    const measurements: string[] = [];
    if (testCase.timeMs !== undefined) {
      measurements.push(`${testCase.timeMs} ms`);
    }
    if (testCase.memoryKb !== undefined) {
      measurements.push(formatMemory(testCase.memoryKb));
    }

    let line = `  Test ${testCase.index}: ${this.formatVerdict(testCase.verdict)}`;
    if (measurements.length > 0) {
      line += ` (${measurements.join(', ')})`;
    }
    if (testCase.message) {
      line += ` - ${testCase.message}`;
    }
    return line;
  }

  private paint(tone: Tone, text: string): string {
    switch (tone) {
      case 'success':
        return this.style.green(text);
      case 'failure':
        return this.style.red(text);
      case 'warning':
        return this.style.yellow(text);
      case 'progress':
        return this.style.blue(text);
    }
  }

  private redraw(lines: string[]): void {
    if (this.live && this.drawnLines > 0) {
      // cursor up, then clear to the end of the screen
      this.out.write(`\x1b[${this.drawnLines}A\x1b[0J`);
      this.drawnLines = 0;
    }
    this.append(lines);
  }

  private append(lines: string[]): void {
    this.write(lines);
    this.drawnLines += lines.length;
  }

  private write(lines: string[]): void {
    this.out.write(lines.map((line) => `${line}\n`).join(''));
  }
}
