/**
 * Retry mechanism types and interfaces
 */

import type { ErrorClass } from '@rebound/errors';
import type { LoggerReference, LogLevel } from '@rebound/logging';

/**
 * A value given either directly or as a zero-argument resolver called once per call
 */
export type MaybeDeferred<T> = T | (() => T);

/**
 * A single item or an ordered list of items
 */
export type MaybeArray<T> = T | readonly T[];

/**
 * Facts about one attempt, handed to event handlers and to wait sequences
 */
export interface RetryDetails<TArgs extends readonly unknown[] = readonly unknown[], TResult = unknown> {
  /** The wrapped function */
  readonly target: (...args: never) => unknown;
  /** Name of the wrapped function, `anonymous` when it has none */
  readonly targetName: string;
  /** Arguments of the call being retried */
  readonly args: TArgs;
  /** Attempts made so far (1-based) */
  readonly tries: number;
  /** Time since the first attempt started, measured when the attempt was classified */
  readonly elapsedMs: number;
  /** Wait before the next attempt (backoff events only) */
  readonly waitMs?: number;
  /** Value returned by the attempt */
  readonly value?: TResult;
  /** Error thrown by the attempt */
  readonly error?: unknown;
}

export type RetryHandler<TArgs extends readonly unknown[] = readonly unknown[], TResult = unknown> = (
  details: RetryDetails<TArgs, TResult>
) => void | Promise<void>;

export type RetryEvent = 'success' | 'backoff' | 'giveup';

/**
 * How a wrapper runs its calls: on the event loop, or on a thread blocked during waits
 */
export type DriverKind = 'cooperative' | 'blocking';

/**
 * Randomizes a wait before it is used
 */
export type Jitterer = (waitMs: number) => number;

/**
 * A started schedule. Returns the next wait in milliseconds, or `undefined` once a finite
 * schedule is exhausted.
 */
export interface WaitSequence {
  next(record: RetryDetails): number | undefined;
}

export type WaitScheduleKind = 'constant' | 'expo' | 'fibo' | 'decay' | 'runtime' | 'sequence';

/**
 * Stateless description of a wait schedule. Every call to a wrapped function starts a fresh
 * sequence, so schedules reset per call.
 */
export interface WaitSchedule {
  readonly kind: WaitScheduleKind;
  readonly options: Readonly<Record<string, unknown>>;
  start(): WaitSequence;
}

/**
 * Options shared by every retry wrapper
 */
export interface RetryOptions<TArgs extends unknown[], TResult> {
  /** Wait schedule between attempts, default `expo()` */
  wait?: MaybeDeferred<WaitSchedule>;
  /** Give up after this many attempts, `null` for no limit */
  maxTries?: MaybeDeferred<number | null>;
  /** Give up once this much time has elapsed, `null` for no limit */
  maxTimeMs?: MaybeDeferred<number | null>;
  /** Jitter applied to every wait, `null` to use raw schedule values. Default `fullJitter` */
  jitter?: Jitterer | null;
  onSuccess?: MaybeArray<RetryHandler<TArgs, TResult>>;
  onBackoff?: MaybeArray<RetryHandler<TArgs, TResult>>;
  onGiveup?: MaybeArray<RetryHandler<TArgs, TResult>>;
  /** Logger for built-in backoff and give-up lines, `null` to disable. Default `rebound` */
  logger?: LoggerReference;
  backoffLogLevel?: LogLevel;
  giveupLogLevel?: LogLevel;
}

/**
 * Retry when the wrapped function throws one of the given error classes
 */
export interface ExceptionRetryOptions<TArgs extends unknown[], TResult>
  extends RetryOptions<TArgs, TResult> {
  retryOn: ErrorClass | readonly ErrorClass[];
  /** Stop immediately when this returns true for a retryable error */
  giveup?: (error: unknown) => boolean;
  /** Rethrow the last error on give-up (default) or resolve to `undefined` */
  raiseOnGiveup?: boolean;
}

/**
 * Retry while the returned value is unsatisfactory
 */
export interface PredicateRetryOptions<TArgs extends unknown[], TResult>
  extends RetryOptions<TArgs, TResult> {
  /** Returns true for values that should be retried. Default: the value is falsy */
  predicate?: (value: TResult) => boolean;
}

/**
 * Realizes the wait between attempts by blocking the thread
 */
export interface SyncSuspender {
  suspend(waitMs: number): void;
}

/**
 * Realizes the wait between attempts by yielding to the event loop
 */
export interface AsyncSuspender {
  suspend(waitMs: number): Promise<void>;
}
