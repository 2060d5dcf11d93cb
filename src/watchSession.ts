import type { StatusSource } from './apiClient';
import { ApiError, classifyError, describeKind } from './apiErrors';
import { type Clock, systemClock } from './clock';
import { EventChannel } from './eventChannel';
import { moduleLogger } from './logger';
import { type PollDecision, PollScheduler, type PollSchedulerOptions } from './pollScheduler';
import { hasChanged, mergeTestCases } from './verdictModel';
import type {
  FinishedEvent,
  SubmissionId,
  VerdictSnapshot,
  WatchEvent
} from './types';

const log = moduleLogger('watchSession');

export type WatchOptions = PollSchedulerOptions & {
  clock?: Clock;
};

type StopDecision = Extract<PollDecision, { action: 'stop' }>;

/**
 * One watch over one submission: polls the judge until the verdict is final,
 * the retry budget runs out, or `cancel()` is called, and yields what changed
 * along the way. The last event is always a single `Finished`.
 *
 * Polling starts when iteration starts. A session can be iterated once;
 * watching the same submission again needs a new session.
 */
export class WatchSession implements AsyncIterable<WatchEvent> {
  readonly submissionId: SubmissionId;

  private readonly source: StatusSource;
  private readonly scheduler: PollScheduler;
  private readonly clock: Clock;
  private readonly channel = new EventChannel<WatchEvent>();
  private readonly abortController = new AbortController();

  private lastEmitted: VerdictSnapshot | undefined;
  private latest: VerdictSnapshot | undefined;
  private lastError: ApiError | undefined;
  private loop: Promise<void> | undefined;

  constructor(source: StatusSource, submissionId: SubmissionId, options: WatchOptions = {}) {
    const { clock, ...schedulerOptions } = options;
    this.source = source;
    this.submissionId = submissionId;
    this.scheduler = new PollScheduler(schedulerOptions);
    this.clock = clock ?? systemClock;
  }

  get pollCount(): number {
    return this.scheduler.pollCount;
  }

  get cancelled(): boolean {
    return this.scheduler.isCancelled;
  }

  /**
   * Stop watching. The session finishes without waiting for a request already
   * in flight; that request's outcome is dropped. Calling it again does nothing.
   */
  cancel(): void {
    if (this.scheduler.isCancelled) {
      return;
    }
    log.debug(`[WatchSession] Cancel requested for submission ${this.submissionId}`);
    this.scheduler.cancel();
    this.abortController.abort();
  }

  [Symbol.asyncIterator](): AsyncIterator<WatchEvent> {
    if (this.loop) {
      throw new Error(
        `Watch session for submission ${this.submissionId} has already been started; create a new one`
      );
    }

    this.loop = this.run();
    const loop = this.loop;
    const events = this.channel[Symbol.asyncIterator]();

    return {
      next: () => events.next(),
      return: async () => {
        this.cancel();
        await loop;
        return { value: undefined, done: true };
      }
    };
  }

  private async run(): Promise<void> {
    try {
      const decision = await this.pollUntilStopped();
      this.channel.push(this.finishedEvent(decision));
    } catch (error) {
      const apiError = classifyError(error);
      log.error({ err: error }, `[WatchSession] Watch loop failed: ${apiError.message}`);
      this.channel.push({
        type: 'Finished',
        submissionId: this.submissionId,
        snapshot: this.latest ?? null,
        reason: 'Exhausted',
        cause: apiError.kind,
        message: apiError.message
      });
    } finally {
      this.channel.close();
    }
  }

  private async pollUntilStopped(): Promise<StopDecision> {
    let decision = this.scheduler.begin();

    while (decision.action === 'poll') {
      if (decision.delayMs > 0) {
        await this.clock.sleep(decision.delayMs, this.abortController.signal);
      }

      const checkpoint = this.scheduler.checkpoint();
      if (checkpoint.action === 'stop') {
        return checkpoint;
      }

      decision = await this.attempt();
    }

    return decision;
  }

  private async attempt(): Promise<PollDecision> {
    let snapshot: VerdictSnapshot | undefined;

    try {
      snapshot = await this.fetchUnlessCancelled();
    } catch (error) {
      const apiError = classifyError(error);

      if (this.scheduler.isCancelled) {
        return this.scheduler.checkpoint();
      }

      this.lastError = apiError;

      if (!apiError.isRetryable) {
        log.warn(
          { kind: apiError.kind },
          `[WatchSession] Giving up on submission ${this.submissionId}: ${apiError.message}`
        );
        return this.scheduler.recordFatalError(apiError.kind);
      }

      const decision = this.scheduler.recordTransientError(apiError.kind);
      this.channel.push({
        type: 'Error',
        kind: apiError.kind,
        message: apiError.message,
        attempt: this.scheduler.consecutiveErrors,
        maxAttempts: this.scheduler.options.maxConsecutiveErrors
      });
      return decision;
    }

    if (snapshot === undefined || this.scheduler.isCancelled) {
      return this.scheduler.checkpoint();
    }

    const current: VerdictSnapshot = this.latest
      ? { ...snapshot, testCases: mergeTestCases(this.latest.testCases, snapshot.testCases) }
      : snapshot;
    this.latest = current;

    if (hasChanged(this.lastEmitted, current)) {
      this.lastEmitted = current;
      this.channel.push({ type: 'SnapshotChanged', snapshot: current });
    }

    return this.scheduler.recordSuccess(current);
  }

  /**
   * Resolves with `undefined` as soon as the session is cancelled. The request
   * itself keeps running; whatever it settles with afterwards is only logged.
   */
  private fetchUnlessCancelled(): Promise<VerdictSnapshot | undefined> {
    const signal = this.abortController.signal;
    const request = this.source.fetchStatus(this.submissionId);

    return new Promise((resolve, reject) => {
      const onAbort = () => resolve(undefined);
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }

      request.then(
        (snapshot) => {
          signal.removeEventListener('abort', onAbort);
          if (signal.aborted) {
            log.debug(`[WatchSession] Dropped late response for submission ${this.submissionId}`);
          }
          resolve(snapshot);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          if (signal.aborted) {
            log.debug(
              { err: error },
              `[WatchSession] Dropped late failure for submission ${this.submissionId}`
            );
          }
          reject(error);
        }
      );
    });
  }

  private finishedEvent(decision: StopDecision): FinishedEvent {
    const snapshot = this.latest ?? null;
    const submissionId = this.submissionId;

    switch (decision.state) {
      case 'Terminal':
        return { type: 'Finished', submissionId, snapshot, reason: 'Terminal' };
      case 'Cancelled':
        return {
          type: 'Finished',
          submissionId,
          snapshot,
          reason: 'Cancelled',
          message: 'Watch cancelled'
        };
      case 'Exhausted':
        if (decision.cause) {
          const detail = this.lastError?.message ?? describeKind(decision.cause);
          return {
            type: 'Finished',
            submissionId,
            snapshot,
            reason: 'Exhausted',
            cause: decision.cause,
            message: detail
          };
        }
        return {
          type: 'Finished',
          submissionId,
          snapshot,
          reason: 'Exhausted',
          message: `Stopped after ${this.scheduler.pollCount} polls without a final verdict`
        };
    }
  }
}

export function watch(
  source: StatusSource,
  submissionId: SubmissionId,
  options: WatchOptions = {}
): WatchSession {
  return new WatchSession(source, submissionId, options);
}
