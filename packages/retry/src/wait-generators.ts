/**
 * Wait schedules: lazy, restartable sequences of non-negative waits in milliseconds
 */

import { ConfigValidationError } from '@rebound/configuration';
import { ConfigurationError } from '@rebound/errors';
import { z } from 'zod';

import type { Jitterer, RetryDetails, WaitSchedule, WaitScheduleKind, WaitSequence } from './types.js';

const functionSchema = <T>(message: string) =>
  z.custom<T>(value => typeof value === 'function', { message });

const capSchema = z.number().positive();

const ConstantOptionsSchema = z.object({
  intervalMs: z
    .union([z.number().nonnegative(), z.array(z.number().nonnegative())])
    .default(1000),
  jitter: functionSchema<Jitterer>('Expected a jitter function').optional(),
  maxMs: capSchema.optional(),
});

const ExpoOptionsSchema = z.object({
  baseMs: z.number().nonnegative().finite().default(1000),
  factor: z.number().positive().finite().default(2),
  maxMs: capSchema.optional(),
});

const FiboOptionsSchema = z.object({
  scaleMs: z.number().nonnegative().finite().default(1000),
  maxMs: capSchema.optional(),
});

const DecayOptionsSchema = z.object({
  initialMs: z.number().nonnegative().finite().default(1000),
  decayFactor: z.number().positive().finite().default(Math.LN2),
  minMs: z.number().nonnegative().finite().default(0),
});

const RuntimeOptionsSchema = z.object({
  value: functionSchema<(record: RetryDetails) => number>('Expected a wait extractor function'),
});

export type ConstantOptions = z.input<typeof ConstantOptionsSchema>;
export type ExpoOptions = z.input<typeof ExpoOptionsSchema>;
export type FiboOptions = z.input<typeof FiboOptionsSchema>;
export type DecayOptions = z.input<typeof DecayOptionsSchema>;
export type RuntimeOptions = z.input<typeof RuntimeOptionsSchema>;

function parseScheduleOptions<T>(
  kind: WaitScheduleKind,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: unknown
): T {
  const result = schema.safeParse(options ?? {});
  if (!result.success) {
    throw new ConfigValidationError(`Invalid ${kind} wait schedule`, result.error);
  }
  return result.data;
}

/**
 * Clamp a raw wait to a usable non-negative value
 */
export function nonNegative(waitMs: number): number {
  return Number.isNaN(waitMs) ? 0 : Math.max(0, waitMs);
}

function* repeat(value: number): Generator<number, never> {
  for (;;) {
    yield value;
  }
}

function fromIterator(
  kind: WaitScheduleKind,
  options: Readonly<Record<string, unknown>>,
  iterate: () => Iterator<number, unknown>
): WaitSchedule {
  return {
    kind,
    options,
    start(): WaitSequence {
      const iterator = iterate();
      return {
        next: () => {
          const step = iterator.next();
          return step.done ? undefined : nonNegative(step.value);
        },
      };
    },
  };
}

/**
 * Fixed interval, forever. An array of intervals is used once, in order, and then the schedule
 * is exhausted. `jitter` randomizes each value before the optional cap applies.
 */
export function constant(options: ConstantOptions = {}): WaitSchedule {
  const { intervalMs, jitter, maxMs } = parseScheduleOptions('constant', ConstantOptionsSchema, options);

  return fromIterator('constant', { intervalMs, maxMs }, function* () {
    const intervals = typeof intervalMs === 'number' ? repeat(intervalMs) : intervalMs;
    for (const interval of intervals) {
      const value = jitter ? jitter(interval) : interval;
      yield maxMs === undefined ? value : Math.min(value, maxMs);
    }
  });
}

/**
 * Exponential growth: `baseMs * factor^n` for n = 0, 1, 2, ...
 * Once the cap is reached the cap repeats; an overflowing power clamps to the cap, or to
 * Infinity without one.
 */
export function expo(options: ExpoOptions = {}): WaitSchedule {
  const { baseMs, factor, maxMs } = parseScheduleOptions('expo', ExpoOptionsSchema, options);

  return fromIterator('expo', { baseMs, factor, maxMs }, function* () {
    for (let n = 0; ; n++) {
      const value = baseMs === 0 ? 0 : baseMs * factor ** n;
      if (!Number.isFinite(value)) {
        return yield* repeat(maxMs ?? Infinity);
      }
      if (maxMs !== undefined && value >= maxMs) {
        return yield* repeat(maxMs);
      }
      yield value;
    }
  });
}

/**
 * Fibonacci growth: `scaleMs * F(n)` with F seeded 1, 1. Term computation stops at the cap.
 */
export function fibo(options: FiboOptions = {}): WaitSchedule {
  const { scaleMs, maxMs } = parseScheduleOptions('fibo', FiboOptionsSchema, options);

  return fromIterator('fibo', { scaleMs, maxMs }, function* () {
    if (scaleMs === 0) {
      return yield* repeat(0);
    }
    let [current, next] = [1, 1];
    for (;;) {
      const value = scaleMs * current;
      if (!Number.isFinite(value)) {
        return yield* repeat(maxMs ?? Infinity);
      }
      if (maxMs !== undefined && value >= maxMs) {
        return yield* repeat(maxMs);
      }
      yield value;
      [current, next] = [next, current + next];
    }
  });
}

/**
 * Exponential decay: `initialMs * e^(-t * decayFactor)`, never below `minMs`.
 * The default factor (ln 2) halves the wait at every step.
 */
export function decay(options: DecayOptions = {}): WaitSchedule {
  const { initialMs, decayFactor, minMs } = parseScheduleOptions('decay', DecayOptionsSchema, options);

  return fromIterator('decay', { initialMs, decayFactor, minMs }, function* () {
    for (let t = 0; ; t++) {
      const value = initialMs * Math.exp(-t * decayFactor);
      if (value <= minMs) {
        return yield* repeat(minMs);
      }
      yield value;
    }
  });
}

/**
 * Wait computed by the caller from the attempt just made, e.g. a retry-after hint carried by
 * the error or by the returned value.
 */
export function runtime(options: RuntimeOptions): WaitSchedule {
  const { value } = parseScheduleOptions('runtime', RuntimeOptionsSchema, options);

  return {
    kind: 'runtime',
    options: {},
    start: () => ({ next: record => nonNegative(value(record)) }),
  };
}

/**
 * Custom schedule from an iterable factory, called once per call. Finite iterables are allowed;
 * the wrapper gives up when one runs out.
 */
export function sequence(factory: () => Iterable<number>): WaitSchedule {
  if (typeof factory !== 'function') {
    throw new ConfigurationError('Invalid sequence wait schedule', {
      issues: ['Expected a factory function'],
    });
  }

  return fromIterator('sequence', {}, () => factory()[Symbol.iterator]());
}
