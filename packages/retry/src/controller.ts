/**
 * Retry controller: the per-call state machine classifying attempts and deciding what happens next
 */

import { type ErrorClass, matchesErrorType } from '@rebound/errors';

import type { HandlerSet } from './handlers.js';
import { resolveLimit, resolveSchedule } from './options.js';
import type {
  DriverKind,
  Jitterer,
  MaybeDeferred,
  RetryDetails,
  WaitSchedule,
  WaitSequence,
} from './types.js';
import { nonNegative } from './wait-generators.js';

/**
 * How an attempt is judged
 */
export type Classification<TResult> =
  | {
      readonly mode: 'exception';
      readonly retryOn: ErrorClass | readonly ErrorClass[];
      readonly giveup: (error: unknown) => boolean;
    }
  | {
      readonly mode: 'predicate';
      readonly predicate: (value: TResult) => boolean;
    };

/**
 * Validated, normalized wrapper configuration shared by every call
 */
export interface RetryPlan<TArgs extends unknown[], TResult> {
  readonly classification: Classification<TResult>;
  readonly driver: DriverKind;
  readonly wait: MaybeDeferred<WaitSchedule>;
  readonly maxTries: MaybeDeferred<number | null>;
  readonly maxTimeMs: MaybeDeferred<number | null>;
  readonly jitter: Jitterer | null;
  readonly handlers: HandlerSet<TArgs, TResult>;
}

export type AttemptOutcome<TResult> =
  | { readonly kind: 'returned'; readonly value: TResult }
  | { readonly kind: 'threw'; readonly error: unknown };

export type RetryState =
  | 'attempting'
  | 'evaluating'
  | 'succeeded'
  | 'retrying'
  | 'given-up'
  | 'aborted';

export type Transition<TArgs extends unknown[], TResult> =
  | {
      readonly state: 'succeeded';
      readonly value: TResult;
      readonly details: RetryDetails<TArgs, TResult>;
    }
  | {
      readonly state: 'retrying';
      readonly waitMs: number;
      readonly details: RetryDetails<TArgs, TResult>;
    }
  | {
      readonly state: 'given-up';
      readonly outcome: AttemptOutcome<TResult>;
      readonly details: RetryDetails<TArgs, TResult>;
    }
  | {
      readonly state: 'aborted';
      readonly error: unknown;
    };

/**
 * Drives one call to a wrapped function. Limits and the wait schedule are resolved when the
 * controller is created, so deferred options are evaluated once per call and every call starts
 * its own wait sequence.
 */
export class RetryController<TArgs extends unknown[], TResult> {
  private readonly maxTries: number | null;
  private readonly maxTimeMs: number | null;
  private readonly sequence: WaitSequence;
  private state: RetryState = 'attempting';
  private tries = 0;
  private startedAt: number | null = null;

  constructor(
    private readonly plan: RetryPlan<TArgs, TResult>,
    private readonly target: (...args: TArgs) => unknown,
    private readonly args: TArgs
  ) {
    this.maxTries = resolveLimit('maxTries', plan.maxTries);
    this.maxTimeMs = resolveLimit('maxTimeMs', plan.maxTimeMs);
    this.sequence = resolveSchedule(plan.wait).start();
  }

  getState(): RetryState {
    return this.state;
  }

  getTries(): number {
    return this.tries;
  }

  /**
   * Mark the start of the next attempt
   */
  beginAttempt(): void {
    if (this.state !== 'attempting' && this.state !== 'retrying') {
      throw new Error(`Cannot start an attempt in state ${this.state}`);
    }
    this.startedAt ??= performance.now();
    this.tries++;
    this.state = 'attempting';
  }

  /**
   * Classify the outcome of the current attempt
   */
  evaluate(outcome: AttemptOutcome<TResult>): Transition<TArgs, TResult> {
    if (this.state !== 'attempting' || this.tries === 0) {
      throw new Error(`Cannot evaluate an attempt in state ${this.state}`);
    }
    this.state = 'evaluating';

    const details = this.describe(outcome);
    const { classification } = this.plan;

    if (outcome.kind === 'threw') {
      if (classification.mode === 'predicate' || !matchesErrorType(outcome.error, classification.retryOn)) {
        this.state = 'aborted';
        return { state: 'aborted', error: outcome.error };
      }
      if (classification.giveup(outcome.error)) {
        return this.giveUp(outcome, details);
      }
    } else if (classification.mode === 'exception' || !classification.predicate(outcome.value)) {
      this.state = 'succeeded';
      return { state: 'succeeded', value: outcome.value, details };
    }

    if (this.limitReached(details.elapsedMs)) {
      return this.giveUp(outcome, details);
    }

    const next = this.sequence.next(details);
    if (next === undefined) {
      return this.giveUp(outcome, details);
    }

    let waitMs = nonNegative(this.plan.jitter ? this.plan.jitter(next) : next);
    if (this.maxTimeMs !== null) {
      waitMs = Math.min(waitMs, Math.max(0, this.maxTimeMs - details.elapsedMs));
    }

    this.state = 'retrying';
    return { state: 'retrying', waitMs, details: { ...details, waitMs } };
  }

  private limitReached(elapsedMs: number): boolean {
    return (
      (this.maxTries !== null && this.tries >= this.maxTries) ||
      (this.maxTimeMs !== null && elapsedMs >= this.maxTimeMs)
    );
  }

  private giveUp(
    outcome: AttemptOutcome<TResult>,
    details: RetryDetails<TArgs, TResult>
  ): Transition<TArgs, TResult> {
    this.state = 'given-up';
    return { state: 'given-up', outcome, details };
  }

  private describe(outcome: AttemptOutcome<TResult>): RetryDetails<TArgs, TResult> {
    const base = {
      target: this.target,
      targetName: this.target.name || 'anonymous',
      args: this.args,
      tries: this.tries,
      elapsedMs: performance.now() - (this.startedAt ?? performance.now()),
    };
    return outcome.kind === 'threw' ? { ...base, error: outcome.error } : { ...base, value: outcome.value };
  }
}
