/**
 * Retry wrappers: higher-order functions returning a retrying version of a target with the same
 * parameters
 */

import { BlockingSuspender, CooperativeSuspender, runBlocking, runCooperative, type Terminal } from './drivers.js';
import { createExceptionPlan, createPredicatePlan } from './options.js';
import type {
  AsyncSuspender,
  ExceptionRetryOptions,
  PredicateRetryOptions,
  SyncSuspender,
} from './types.js';

export interface CooperativeOptions {
  /** Strategy realizing the wait between attempts, default timers */
  suspender?: AsyncSuspender;
}

export interface BlockingOptions {
  /** Strategy realizing the wait between attempts, default `Atomics.wait` */
  suspender?: SyncSuspender;
}

export type OnExceptionOptions<TArgs extends unknown[], TResult> = ExceptionRetryOptions<TArgs, TResult> &
  CooperativeOptions;
export type OnPredicateOptions<TArgs extends unknown[], TResult> = PredicateRetryOptions<TArgs, TResult> &
  CooperativeOptions;
export type OnExceptionSyncOptions<TArgs extends unknown[], TResult> = ExceptionRetryOptions<TArgs, TResult> &
  BlockingOptions;
export type OnPredicateSyncOptions<TArgs extends unknown[], TResult> = PredicateRetryOptions<TArgs, TResult> &
  BlockingOptions;

function settleException<TResult>(terminal: Terminal<TResult>, raiseOnGiveup: boolean): TResult | undefined {
  if (terminal.state === 'succeeded') {
    return terminal.value;
  }
  if (terminal.outcome.kind === 'returned') {
    return terminal.outcome.value;
  }
  if (raiseOnGiveup) {
    throw terminal.outcome.error;
  }
  return undefined;
}

function settlePredicate<TResult>(terminal: Terminal<TResult>): TResult {
  if (terminal.state === 'succeeded') {
    return terminal.value;
  }
  if (terminal.outcome.kind === 'threw') {
    throw terminal.outcome.error;
  }
  return terminal.outcome.value;
}

function keepName<T extends (...args: never) => unknown>(wrapped: T, target: (...args: never) => unknown): T {
  Object.defineProperty(wrapped, 'name', { value: target.name, configurable: true });
  return wrapped;
}

/**
 * Retry a target, sync or async, while it throws one of the `retryOn` error classes. The wrapper
 * always returns a promise. On give-up the last error is rethrown, or the promise resolves to
 * `undefined` with `raiseOnGiveup: false`.
 */
export function onException<TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult | PromiseLike<TResult>,
  options: OnExceptionOptions<TArgs, TResult> & { raiseOnGiveup?: true }
): (...args: TArgs) => Promise<TResult>;
export function onException<TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult | PromiseLike<TResult>,
  options: OnExceptionOptions<TArgs, TResult>
): (...args: TArgs) => Promise<TResult | undefined>;
export function onException<TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult | PromiseLike<TResult>,
  options: OnExceptionOptions<TArgs, TResult>
): (...args: TArgs) => Promise<TResult | undefined> {
  const plan = createExceptionPlan(options);
  const suspender = options.suspender ?? new CooperativeSuspender();
  const raiseOnGiveup = options.raiseOnGiveup ?? true;

  return keepName(async function (this: unknown, ...args: TArgs): Promise<TResult | undefined> {
    return settleException(await runCooperative(plan, target, this, args, suspender), raiseOnGiveup);
  }, target);
}

/**
 * Retry a target, sync or async, while `predicate` holds for its value (default: the value is
 * falsy). On give-up the promise resolves to the last value. Errors are never retried.
 */
export function onPredicate<TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult | PromiseLike<TResult>,
  options: OnPredicateOptions<TArgs, TResult> = {}
): (...args: TArgs) => Promise<TResult> {
  const plan = createPredicatePlan(options);
  const suspender = options.suspender ?? new CooperativeSuspender();

  return keepName(async function (this: unknown, ...args: TArgs): Promise<TResult> {
    return settlePredicate(await runCooperative(plan, target, this, args, suspender));
  }, target);
}

/**
 * Blocking counterpart of {@link onException} for synchronous targets
 */
export function onExceptionSync<TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult,
  options: OnExceptionSyncOptions<TArgs, TResult> & { raiseOnGiveup?: true }
): (...args: TArgs) => TResult;
export function onExceptionSync<TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult,
  options: OnExceptionSyncOptions<TArgs, TResult>
): (...args: TArgs) => TResult | undefined;
export function onExceptionSync<TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult,
  options: OnExceptionSyncOptions<TArgs, TResult>
): (...args: TArgs) => TResult | undefined {
  const plan = createExceptionPlan(options, 'blocking');
  const suspender = options.suspender ?? new BlockingSuspender();
  const raiseOnGiveup = options.raiseOnGiveup ?? true;

  return keepName(function (this: unknown, ...args: TArgs): TResult | undefined {
    return settleException(runBlocking(plan, target, this, args, suspender), raiseOnGiveup);
  }, target);
}

/**
 * Blocking counterpart of {@link onPredicate} for synchronous targets
 */
export function onPredicateSync<TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult,
  options: OnPredicateSyncOptions<TArgs, TResult> = {}
): (...args: TArgs) => TResult {
  const plan = createPredicatePlan(options, 'blocking');
  const suspender = options.suspender ?? new BlockingSuspender();

  return keepName(function (this: unknown, ...args: TArgs): TResult {
    return settlePredicate(runBlocking(plan, target, this, args, suspender));
  }, target);
}
