import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { PollScheduler } from '../pollScheduler';
import { snapshot } from './helpers';

describe('PollScheduler', () => {
  it('starts Idle and polls immediately on begin', () => {
    const scheduler = new PollScheduler();
    expect(scheduler.state).toBe('Idle');
    expect(scheduler.begin()).toEqual({ action: 'poll', delayMs: 0 });
    expect(scheduler.state).toBe('Polling');
  });

  it('uses a fixed interval by default', () => {
    const scheduler = new PollScheduler();
    scheduler.begin();
    expect(scheduler.recordTransientError('Transient')).toEqual({ action: 'poll', delayMs: 1000 });
    expect(scheduler.recordTransientError('Transient')).toEqual({ action: 'poll', delayMs: 1000 });
    expect(scheduler.recordSuccess(snapshot('Judging'))).toEqual({ action: 'poll', delayMs: 1000 });
  });

  it('backs off on consecutive errors up to the cap and resets after a success', () => {
    const scheduler = new PollScheduler({
      initialIntervalMs: 1000,
      backoffMultiplier: 2.0,
      maxIntervalMs: 4000
    });
    scheduler.begin();

    const waits = [1, 2, 3, 4].map(() => {
      const decision = scheduler.recordTransientError('Transient');
      return decision.action === 'poll' ? decision.delayMs : -1;
    });
    expect(waits).toEqual([1000, 2000, 4000, 4000]);

    expect(scheduler.recordSuccess(snapshot('Judging'))).toEqual({ action: 'poll', delayMs: 1000 });
    expect(scheduler.recordTransientError('Transient')).toEqual({ action: 'poll', delayMs: 1000 });
  });

  it('resets the consecutive error count after a success', () => {
    const scheduler = new PollScheduler({ maxConsecutiveErrors: 2 });
    scheduler.begin();
    scheduler.recordTransientError('Transient');
    scheduler.recordSuccess(snapshot('Judging'));
    expect(scheduler.consecutiveErrors).toBe(0);
    expect(scheduler.recordTransientError('Transient').action).toBe('poll');
  });

  it('stops as Terminal on a final verdict', () => {
    const scheduler = new PollScheduler();
    scheduler.begin();
    expect(scheduler.recordSuccess(snapshot('WrongAnswer', ['WrongAnswer']))).toEqual({
      action: 'stop',
      state: 'Terminal'
    });
    expect(scheduler.state).toBe('Terminal');
  });

  it('stops as Exhausted once consecutive errors reach the limit', () => {
    const scheduler = new PollScheduler({ maxConsecutiveErrors: 3 });
    scheduler.begin();
    expect(scheduler.recordTransientError('Transient').action).toBe('poll');
    expect(scheduler.recordTransientError('Malformed').action).toBe('poll');
    expect(scheduler.recordTransientError('Transient')).toEqual({
      action: 'stop',
      state: 'Exhausted',
      cause: 'Transient'
    });
  });

  it('stops as Exhausted at the total poll ceiling', () => {
    const scheduler = new PollScheduler({ maxTotalPolls: 2 });
    scheduler.begin();
    expect(scheduler.recordSuccess(snapshot('Queued')).action).toBe('poll');
    expect(scheduler.recordSuccess(snapshot('Judging'))).toEqual({ action: 'stop', state: 'Exhausted' });
    expect(scheduler.pollCount).toBe(2);
  });

  it('stops immediately on a fatal error', () => {
    const scheduler = new PollScheduler();
    scheduler.begin();
    expect(scheduler.recordFatalError('Unauthorized')).toEqual({
      action: 'stop',
      state: 'Exhausted',
      cause: 'Unauthorized'
    });
  });

  it('puts cancellation ahead of every other stop condition', () => {
    const scheduler = new PollScheduler({ maxConsecutiveErrors: 1 });
    scheduler.begin();
    scheduler.cancel();
    expect(scheduler.recordSuccess(snapshot('Accepted', ['Accepted']))).toEqual({
      action: 'stop',
      state: 'Cancelled'
    });
  });

  it('puts a terminal verdict ahead of the poll ceiling', () => {
    const scheduler = new PollScheduler({ maxTotalPolls: 1 });
    scheduler.begin();
    expect(scheduler.recordSuccess(snapshot('Accepted', ['Accepted']))).toEqual({
      action: 'stop',
      state: 'Terminal'
    });
  });

  it('stays stopped', () => {
    const scheduler = new PollScheduler();
    scheduler.begin();
    scheduler.recordFatalError('NotFound');
    expect(scheduler.recordSuccess(snapshot('Judging'))).toEqual({
      action: 'stop',
      state: 'Exhausted',
      cause: 'NotFound'
    });
    expect(scheduler.checkpoint()).toEqual({ action: 'stop', state: 'Exhausted', cause: 'NotFound' });
    expect(scheduler.pollCount).toBe(1);
  });

  it('treats cancel as idempotent', () => {
    const scheduler = new PollScheduler();
    scheduler.begin();
    scheduler.cancel();
    scheduler.cancel();
    expect(scheduler.checkpoint()).toEqual({ action: 'stop', state: 'Cancelled' });
    expect(scheduler.state).toBe('Cancelled');
  });

  it('rejects an initial interval above the cap', () => {
    expect(() => new PollScheduler({ initialIntervalMs: 6000, maxIntervalMs: 5000 })).toThrow(ZodError);
  });

  it('rejects a multiplier below 1', () => {
    expect(() => new PollScheduler({ backoffMultiplier: 0.5 })).toThrow(ZodError);
  });
});
