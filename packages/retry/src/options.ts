/**
 * Wrap-time validation and call-time resolution of retry options
 */

import { formatIssues } from '@rebound/configuration';
import { ConfigurationError, type ErrorClass } from '@rebound/errors';
import { z } from 'zod';

import type { Classification, RetryPlan } from './controller.js';
import { buildHandlerSet } from './handlers.js';
import { fullJitter } from './jitter.js';
import type {
  ExceptionRetryOptions,
  DriverKind,
  MaybeDeferred,
  PredicateRetryOptions,
  RetryOptions,
  WaitSchedule,
} from './types.js';
import { expo } from './wait-generators.js';

type LimitName = 'maxTries' | 'maxTimeMs';

const LIMIT_SCHEMAS: Record<LimitName, z.ZodType<number | null, z.ZodTypeDef, unknown>> = {
  maxTries: z.number().int().positive().nullable(),
  maxTimeMs: z.number().positive().nullable(),
};

function checkLimit(name: LimitName, value: unknown): number | null {
  const result = LIMIT_SCHEMAS[name].safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${name} option`, {
      issues: formatIssues(result.error).map(issue => `${name}: ${issue}`),
    });
  }
  return result.data;
}

/**
 * Resolve a stop limit for one call; absent means unlimited
 */
export function resolveLimit(
  name: LimitName,
  value: MaybeDeferred<number | null> | undefined
): number | null {
  if (value === undefined) {
    return null;
  }
  return checkLimit(name, typeof value === 'function' ? value() : value);
}

function isWaitSchedule(value: unknown): value is WaitSchedule {
  return (
    typeof value === 'object' &&
    value !== null &&
    'start' in value &&
    typeof value.start === 'function'
  );
}

/**
 * Resolve the wait schedule for one call
 */
export function resolveSchedule(wait: MaybeDeferred<WaitSchedule>): WaitSchedule {
  const schedule: unknown = typeof wait === 'function' ? wait() : wait;
  if (!isWaitSchedule(schedule)) {
    throw new ConfigurationError('Invalid wait option', {
      issues: ['wait: expected a wait schedule such as expo() or constant()'],
    });
  }
  return schedule;
}

function checkErrorClasses(retryOn: ErrorClass | readonly ErrorClass[]): void {
  const classes: readonly unknown[] = typeof retryOn === 'function' ? [retryOn] : retryOn;
  if (!Array.isArray(classes) || classes.length === 0 || classes.some(c => typeof c !== 'function')) {
    throw new ConfigurationError('Invalid retryOn option', {
      issues: ['retryOn: expected an error class or a non-empty list of error classes'],
    });
  }
}

function createPlan<TArgs extends unknown[], TResult>(
  options: RetryOptions<TArgs, TResult>,
  classification: Classification<TResult>,
  driver: DriverKind
): RetryPlan<TArgs, TResult> {
  const { wait = expo(), maxTries = null, maxTimeMs = null, jitter = fullJitter } = options;

  // Static values fail here, deferred ones when a call resolves them
  if (typeof maxTries !== 'function') checkLimit('maxTries', maxTries);
  if (typeof maxTimeMs !== 'function') checkLimit('maxTimeMs', maxTimeMs);
  if (typeof wait !== 'function') resolveSchedule(wait);
  if (jitter !== null && typeof jitter !== 'function') {
    throw new ConfigurationError('Invalid jitter option', {
      issues: ['jitter: expected a jitter function or null'],
    });
  }

  return {
    classification,
    driver,
    wait,
    maxTries,
    maxTimeMs,
    jitter,
    handlers: buildHandlerSet(options, driver),
  };
}

export function createExceptionPlan<TArgs extends unknown[], TResult>(
  options: ExceptionRetryOptions<TArgs, TResult>,
  driver: DriverKind = 'cooperative'
): RetryPlan<TArgs, TResult> {
  checkErrorClasses(options.retryOn);
  return createPlan(
    options,
    {
      mode: 'exception',
      retryOn: options.retryOn,
      giveup: options.giveup ?? (() => false),
    },
    driver
  );
}

export function createPredicatePlan<TArgs extends unknown[], TResult>(
  options: PredicateRetryOptions<TArgs, TResult>,
  driver: DriverKind = 'cooperative'
): RetryPlan<TArgs, TResult> {
  return createPlan(
    options,
    {
      mode: 'predicate',
      predicate: options.predicate ?? (value => !value),
    },
    driver
  );
}
