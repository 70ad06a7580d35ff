/**
 * Retry event handlers: normalization, built-in log lines and invocation per driver
 */

import { inspect, types } from 'util';

import { ConfigurationError, HandlerContractError, describeError } from '@rebound/errors';
import { type Logger, LoggerFactory, LogLevel } from '@rebound/logging';

import type {
  DriverKind,
  MaybeArray,
  RetryDetails,
  RetryEvent,
  RetryHandler,
  RetryOptions,
} from './types.js';

/** Name of the shared logger used when no logger option is given */
export const DEFAULT_LOGGER_NAME = 'rebound';

/**
 * Handlers per event, in invocation order
 */
export interface HandlerSet<TArgs extends unknown[], TResult> {
  readonly success: readonly RetryHandler<TArgs, TResult>[];
  readonly backoff: readonly RetryHandler<TArgs, TResult>[];
  readonly giveup: readonly RetryHandler<TArgs, TResult>[];
}

export function toHandlerList<TArgs extends unknown[], TResult>(
  handlers: MaybeArray<RetryHandler<TArgs, TResult>> | undefined
): RetryHandler<TArgs, TResult>[] {
  if (handlers === undefined) {
    return [];
  }
  return typeof handlers === 'function' ? [handlers] : [...handlers];
}

function describeOutcome(details: RetryDetails): string {
  return 'error' in details
    ? describeError(details.error)
    : inspect(details.value, { depth: 2, breakLength: Infinity });
}

/**
 * Handlers writing `Backing off ...` and `Giving up ...` lines
 */
export function createLogHandlers(
  logger: Logger,
  levels: { backoff: LogLevel; giveup: LogLevel }
): { backoff: RetryHandler; giveup: RetryHandler } {
  return {
    backoff: details => {
      const waitMs = details.waitMs ?? 0;
      logger.log(
        levels.backoff,
        `Backing off ${details.targetName}(...) for ${(waitMs / 1000).toFixed(1)}s (${describeOutcome(details)})`,
        { tries: details.tries, elapsedMs: details.elapsedMs, waitMs }
      );
    },
    giveup: details => {
      logger.log(
        levels.giveup,
        `Giving up ${details.targetName}(...) after ${details.tries} tries (${describeOutcome(details)})`,
        { tries: details.tries, elapsedMs: details.elapsedMs },
        details.error
      );
    },
  };
}

const HANDLER_OPTIONS = ['onSuccess', 'onBackoff', 'onGiveup'] as const;

function rejectAsyncHandlers<TArgs extends unknown[], TResult>(options: RetryOptions<TArgs, TResult>): void {
  const issues = HANDLER_OPTIONS.flatMap(name =>
    toHandlerList(options[name]).some(handler => types.isAsyncFunction(handler))
      ? [`${name}: async handlers cannot run while the blocking driver holds the thread`]
      : []
  );
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid handler options for a blocking wrapper', { issues });
  }
}

/**
 * Normalize the handler options of a wrapper. The log handler, when logging is enabled, runs
 * before the caller's handlers. Blocking wrappers refuse `async` handlers up front.
 */
export function buildHandlerSet<TArgs extends unknown[], TResult>(
  options: RetryOptions<TArgs, TResult>,
  driver: DriverKind = 'cooperative'
): HandlerSet<TArgs, TResult> {
  if (driver === 'blocking') {
    rejectAsyncHandlers(options);
  }

  const logger = LoggerFactory.resolve(
    options.logger === undefined ? DEFAULT_LOGGER_NAME : options.logger
  );
  const log = logger
    ? createLogHandlers(logger, {
        backoff: options.backoffLogLevel ?? LogLevel.INFO,
        giveup: options.giveupLogLevel ?? LogLevel.ERROR,
      })
    : null;

  return {
    success: toHandlerList(options.onSuccess),
    backoff: [...(log ? [log.backoff] : []), ...toHandlerList(options.onBackoff)],
    giveup: [...(log ? [log.giveup] : []), ...toHandlerList(options.onGiveup)],
  };
}

/**
 * Run handlers in order, awaiting each one
 */
export async function invokeHandlers<TArgs extends unknown[], TResult>(
  handlers: readonly RetryHandler<TArgs, TResult>[],
  details: RetryDetails<TArgs, TResult>
): Promise<void> {
  for (const handler of handlers) {
    await handler(details);
  }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function'
  );
}

/**
 * Run handlers in order on a thread that cannot wait for promises
 */
export function invokeHandlersSync<TArgs extends unknown[], TResult>(
  event: RetryEvent,
  handlers: readonly RetryHandler<TArgs, TResult>[],
  details: RetryDetails<TArgs, TResult>
): void {
  for (const handler of handlers) {
    const result: unknown = handler(details);
    if (isPromiseLike(result)) {
      // Nothing awaits the abandoned promise, so its rejection is dropped here
      Promise.resolve(result).catch(() => undefined);
      throw new HandlerContractError(
        `The ${event} handler of ${details.targetName} returned a promise; blocking retries need synchronous handlers`,
        { event, target: details.targetName }
      );
    }
  }
}
