import { z } from 'zod';
import { moduleLogger } from './logger';
import { isTerminal } from './verdictModel';
import type { ApiErrorKind, VerdictSnapshot } from './types';

const log = moduleLogger('pollScheduler');

export const PollSchedulerOptionsSchema = z
  .object({
    initialIntervalMs: z.number().int().positive().default(1000),
    maxIntervalMs: z.number().int().positive().default(5000),
    backoffMultiplier: z.number().min(1).default(1.0),
    maxConsecutiveErrors: z.number().int().positive().default(5),
    maxTotalPolls: z.number().int().positive().optional()
  })
  .refine((options) => options.initialIntervalMs <= options.maxIntervalMs, {
    message: 'initialIntervalMs must not exceed maxIntervalMs',
    path: ['initialIntervalMs']
  });

export type PollSchedulerOptions = z.input<typeof PollSchedulerOptionsSchema>;
export type ResolvedPollSchedulerOptions = z.output<typeof PollSchedulerOptionsSchema>;

export type SchedulerState = 'Idle' | 'Polling' | 'Terminal' | 'Cancelled' | 'Exhausted';

export type StopState = Exclude<SchedulerState, 'Idle' | 'Polling'>;

export type PollDecision =
  | { readonly action: 'poll'; readonly delayMs: number }
  | { readonly action: 'stop'; readonly state: StopState; readonly cause?: ApiErrorKind };

/**
 * Decides how long to wait before the next status query and when to stop.
 *
 * Idle -> Polling -> { Terminal, Cancelled, Exhausted }. After every attempt
 * the stop conditions are checked in priority order: cancellation, a terminal
 * verdict, too many consecutive errors, the total poll ceiling. Once stopped
 * the scheduler keeps returning the same stop decision.
 */
export class PollScheduler {
  readonly options: ResolvedPollSchedulerOptions;

  private currentState: SchedulerState = 'Idle';
  private stopDecision: PollDecision | undefined;
  private cancelled = false;
  private terminal = false;
  private polls = 0;
  private errors = 0;
  private lastErrorKind: ApiErrorKind | undefined;
  private intervalMs: number;

  constructor(options: PollSchedulerOptions = {}) {
    this.options = PollSchedulerOptionsSchema.parse(options);
    this.intervalMs = this.options.initialIntervalMs;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  get pollCount(): number {
    return this.polls;
  }

  get consecutiveErrors(): number {
    return this.errors;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Leave Idle. The first poll goes out without a delay.
   */
  begin(): PollDecision {
    if (this.currentState === 'Idle') {
      this.currentState = 'Polling';
    }
    return this.decide(0);
  }

  /**
   * Called before each poll is issued
   */
  checkpoint(): PollDecision {
    return this.decide(0);
  }

  recordSuccess(snapshot: VerdictSnapshot): PollDecision {
    if (this.stopDecision) {
      return this.stopDecision;
    }

    this.polls++;
    this.errors = 0;
    this.lastErrorKind = undefined;
    this.intervalMs = this.options.initialIntervalMs;
    this.terminal = isTerminal(snapshot.overallVerdict);

    return this.decide(this.intervalMs);
  }

  recordTransientError(kind: ApiErrorKind): PollDecision {
    if (this.stopDecision) {
      return this.stopDecision;
    }

    this.polls++;
    this.errors++;
    this.lastErrorKind = kind;

    const delayMs = this.intervalMs;
    this.intervalMs = Math.min(
      this.options.maxIntervalMs,
      Math.round(this.intervalMs * this.options.backoffMultiplier)
    );

    log.debug(
      `[PollScheduler] ${kind} error ${this.errors}/${this.options.maxConsecutiveErrors}, next wait ${delayMs}ms`
    );

    return this.decide(delayMs);
  }

  /**
   * Errors that waiting cannot fix end polling immediately
   */
  recordFatalError(kind: ApiErrorKind): PollDecision {
    if (this.stopDecision) {
      return this.stopDecision;
    }

    this.polls++;
    return this.stop('Exhausted', kind);
  }

  cancel(): void {
    this.cancelled = true;
  }

  private decide(delayMs: number): PollDecision {
    if (this.stopDecision) {
      return this.stopDecision;
    }

    if (this.cancelled) {
      return this.stop('Cancelled');
    }

    if (this.terminal) {
      return this.stop('Terminal');
    }

    if (this.errors >= this.options.maxConsecutiveErrors) {
      return this.stop('Exhausted', this.lastErrorKind);
    }

    const { maxTotalPolls } = this.options;
    if (maxTotalPolls !== undefined && this.polls >= maxTotalPolls) {
      return this.stop('Exhausted');
    }

    return { action: 'poll', delayMs };
  }

  private stop(state: StopState, cause?: ApiErrorKind): PollDecision {
    this.currentState = state;
    this.stopDecision = cause ? { action: 'stop', state, cause } : { action: 'stop', state };
    log.debug(`[PollScheduler] Stopped: ${state}${cause ? ` (${cause})` : ''} after ${this.polls} polls`);
    return this.stopDecision;
  }
}
