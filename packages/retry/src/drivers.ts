/**
 * Execution drivers: run the attempt loop of one call, realizing waits by blocking the thread
 * or by yielding to the event loop
 */

import {
  type AttemptOutcome,
  RetryController,
  type RetryPlan,
} from './controller.js';
import { invokeHandlers, invokeHandlersSync } from './handlers.js';
import type { AsyncSuspender, SyncSuspender } from './types.js';

/** Longest delay a single Node.js timer accepts */
export const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Suspends by parking the thread on a shared buffer nobody notifies
 */
export class BlockingSuspender implements SyncSuspender {
  private readonly cell = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));

  suspend(waitMs: number): void {
    if (waitMs > 0) {
      Atomics.wait(this.cell, 0, 0, waitMs);
    }
  }
}

/**
 * Suspends with timers, chaining them for waits longer than one timer can hold
 */
export class CooperativeSuspender implements AsyncSuspender {
  async suspend(waitMs: number): Promise<void> {
    let remaining = waitMs;
    while (remaining > 0) {
      const step = Math.min(remaining, MAX_TIMER_MS);
      await new Promise<void>(resolve => setTimeout(resolve, step));
      remaining -= step;
    }
  }
}

/**
 * How a call ended when it did not abort
 */
export type Terminal<TResult> =
  | { readonly state: 'succeeded'; readonly value: TResult }
  | { readonly state: 'given-up'; readonly outcome: AttemptOutcome<TResult> };

function attemptAsync<TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult | PromiseLike<TResult>,
  thisArg: unknown,
  args: TArgs
): Promise<AttemptOutcome<TResult>> {
  return Promise.resolve()
    .then(() => target.apply(thisArg, args))
    .then(
      (value): AttemptOutcome<TResult> => ({ kind: 'returned', value }),
      (error: unknown): AttemptOutcome<TResult> => ({ kind: 'threw', error })
    );
}

function attemptSync<TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult,
  thisArg: unknown,
  args: TArgs
): AttemptOutcome<TResult> {
  try {
    return { kind: 'returned', value: target.apply(thisArg, args) };
  } catch (error) {
    return { kind: 'threw', error };
  }
}

/**
 * Run one call on the event loop. The target may return a value or a promise; handlers may be
 * asynchronous and are awaited in order.
 */
export async function runCooperative<TArgs extends unknown[], TResult>(
  plan: RetryPlan<TArgs, TResult>,
  target: (...args: TArgs) => TResult | PromiseLike<TResult>,
  thisArg: unknown,
  args: TArgs,
  suspender: AsyncSuspender
): Promise<Terminal<TResult>> {
  const controller = new RetryController(plan, target, args);

  for (;;) {
    controller.beginAttempt();
    const transition = controller.evaluate(await attemptAsync(target, thisArg, args));

    switch (transition.state) {
      case 'aborted':
        throw transition.error;
      case 'succeeded':
        await invokeHandlers(plan.handlers.success, transition.details);
        return { state: 'succeeded', value: transition.value };
      case 'given-up':
        await invokeHandlers(plan.handlers.giveup, transition.details);
        return { state: 'given-up', outcome: transition.outcome };
      case 'retrying':
        await invokeHandlers(plan.handlers.backoff, transition.details);
        await suspender.suspend(transition.waitMs);
        break;
    }
  }
}

/**
 * Run one call on the current thread, blocking it during waits
 */
export function runBlocking<TArgs extends unknown[], TResult>(
  plan: RetryPlan<TArgs, TResult>,
  target: (...args: TArgs) => TResult,
  thisArg: unknown,
  args: TArgs,
  suspender: SyncSuspender
): Terminal<TResult> {
  const controller = new RetryController(plan, target, args);

  for (;;) {
    controller.beginAttempt();
    const transition = controller.evaluate(attemptSync(target, thisArg, args));

    switch (transition.state) {
      case 'aborted':
        throw transition.error;
      case 'succeeded':
        invokeHandlersSync('success', plan.handlers.success, transition.details);
        return { state: 'succeeded', value: transition.value };
      case 'given-up':
        invokeHandlersSync('giveup', plan.handlers.giveup, transition.details);
        return { state: 'given-up', outcome: transition.outcome };
      case 'retrying':
        invokeHandlersSync('backoff', plan.handlers.backoff, transition.details);
        suspender.suspend(transition.waitMs);
        break;
    }
  }
}
