import type { StatusSource } from '../apiClient';
import { ApiError } from '../apiErrors';
import type { Clock } from '../clock';
import { isTerminal } from '../verdictModel';
import type {
  OverallVerdict,
  SubmissionId,
  TestCaseResult,
  TestCaseVerdict,
  VerdictSnapshot,
  WatchEvent
} from '../types';

export const FETCHED_AT = new Date('2026-03-01T08:00:00.000Z');

export function testCase(
  index: number,
  verdict: TestCaseVerdict,
  extra: Partial<Omit<TestCaseResult, 'index' | 'verdict'>> = {}
): TestCaseResult {
  return { index, verdict, ...extra };
}

/**
 * Snapshot whose test cases are given by verdict in index order
 */
export function snapshot(
  overallVerdict: OverallVerdict,
  verdicts: TestCaseVerdict[] = [],
  extra: Partial<VerdictSnapshot> = {}
): VerdictSnapshot {
  return {
    submissionId: 42,
    overallVerdict,
    testCases: verdicts.map((verdict, i) => testCase(i + 1, verdict)),
    judgingComplete: isTerminal(overallVerdict),
    fetchedAt: FETCHED_AT,
    ...extra
  };
}

export type Step = VerdictSnapshot | ApiError | (() => Promise<VerdictSnapshot>);

/**
 * Plays back a fixed list of responses; the last one repeats forever
 */
export class ScriptedSource implements StatusSource {
  calls = 0;
  readonly requested: SubmissionId[] = [];

  constructor(private readonly steps: Step[]) {}

  async fetchStatus(submissionId: SubmissionId): Promise<VerdictSnapshot> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls++;
    this.requested.push(submissionId);

    if (step instanceof ApiError) {
      throw step;
    }
    if (typeof step === 'function') {
      return step();
    }
    return step;
  }
}

/**
 * Sleeps return immediately; the requested delays are recorded
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private current = FETCHED_AT.getTime();

  now(): Date {
    return new Date(this.current);
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

/**
 * Sleeps only end when the session is cancelled
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];
  private sleepStarted: (() => void) | undefined;

  now(): Date {
    return FETCHED_AT;
  }

  sleep(ms: number, signal: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    this.sleepStarted?.();
    this.sleepStarted = undefined;

    return new Promise<void>((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      signal.addEventListener('abort', () => resolve(), { once: true });
    });
  }

  /**
   * Resolves once the next sleep has begun
   */
  nextSleep(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.sleepStarted = resolve;
    });
  }
}

export function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export async function collect(events: AsyncIterable<WatchEvent>): Promise<WatchEvent[]> {
  const collected: WatchEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

export class MemoryOutput {
  chunks: string[] = [];
  isTTY?: boolean;

  constructor(isTTY = false) {
    this.isTTY = isTTY;
  }

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }

  get lines(): string[] {
    return this.text.split('\n').filter((line) => line.length > 0);
  }
}
