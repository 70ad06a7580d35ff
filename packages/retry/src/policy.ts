/**
 * Named retry policies declared in YAML files
 */

import {
  ConfigManager,
  ConfigUtils,
  ConfigValidationError,
  type ConfigOptions,
} from '@rebound/configuration';
import { ConfigurationError } from '@rebound/errors';
import { z } from 'zod';

import { fullJitter, randomJitter } from './jitter.js';
import type { Jitterer, RetryDetails, WaitSchedule } from './types.js';
import { constant, decay, expo, fibo, nonNegative } from './wait-generators.js';

const duration = ConfigUtils.durationTransformer();

const ScheduleConfigSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal('constant'),
      interval: duration.optional(),
      max: duration.optional(),
    })
    .strict(),
  z
    .object({
      kind: z.literal('expo'),
      base: duration.optional(),
      factor: z.number().optional(),
      max: duration.optional(),
    })
    .strict(),
  z
    .object({
      kind: z.literal('fibo'),
      scale: duration.optional(),
      max: duration.optional(),
    })
    .strict(),
  z
    .object({
      kind: z.literal('decay'),
      initial: duration.optional(),
      decay_factor: z.number().optional(),
      min: duration.optional(),
    })
    .strict(),
]);

const JitterNameSchema = z.enum(['full', 'random', 'none']);

const PolicyConfigSchema = z
  .object({
    schedule: ScheduleConfigSchema.default({ kind: 'expo' }),
    jitter: JitterNameSchema.default('full'),
    max_tries: z.number().int().positive().nullable().default(null),
    max_time: duration.pipe(z.number().positive()).nullable().default(null),
  })
  .strict();

export const PolicyFileSchema = z
  .object({
    policies: z.record(z.string(), PolicyConfigSchema),
  })
  .strict();

export type ScheduleConfig = z.output<typeof ScheduleConfigSchema>;
export type JitterName = z.output<typeof JitterNameSchema>;
export type PolicyConfig = z.output<typeof PolicyConfigSchema>;
export type PolicyFile = z.output<typeof PolicyFileSchema>;

/**
 * Wrapper options produced by a policy; spread them into any retry wrapper
 */
export interface RetryPolicy {
  readonly wait: WaitSchedule;
  readonly jitter: Jitterer | null;
  readonly maxTries: number | null;
  readonly maxTimeMs: number | null;
}

const JITTERS: Record<JitterName, Jitterer | null> = {
  full: fullJitter,
  random: randomJitter,
  none: null,
};

export function buildSchedule(config: ScheduleConfig): WaitSchedule {
  switch (config.kind) {
    case 'constant':
      return constant({ intervalMs: config.interval, maxMs: config.max });
    case 'expo':
      return expo({ baseMs: config.base, factor: config.factor, maxMs: config.max });
    case 'fibo':
      return fibo({ scaleMs: config.scale, maxMs: config.max });
    case 'decay':
      return decay({ initialMs: config.initial, decayFactor: config.decay_factor, minMs: config.min });
  }
}

function buildPolicy(name: string, config: PolicyConfig): RetryPolicy {
  try {
    return {
      wait: buildSchedule(config.schedule),
      jitter: JITTERS[config.jitter],
      maxTries: config.max_tries,
      maxTimeMs: config.max_time,
    };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationError(`Invalid retry policy "${name}"`, {
        cause: error,
        issues: error.getFormattedIssues().map(issue => `policies.${name}.schedule: ${issue}`),
      });
    }
    throw error;
  }
}

/**
 * Validate a parsed policy document and build its policies
 */
export function parseRetryPolicies(document: unknown): Map<string, RetryPolicy> {
  const result = PolicyFileSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigValidationError('Invalid retry policy document', result.error);
  }
  return buildPolicies(result.data);
}

function buildPolicies(file: PolicyFile): Map<string, RetryPolicy> {
  return new Map(
    Object.entries(file.policies).map(([name, config]) => [name, buildPolicy(name, config)])
  );
}

/**
 * Load the policies of a YAML file. `${VAR:-default}` references are substituted before
 * validation.
 */
export async function loadRetryPolicies(
  path: string,
  options: Omit<ConfigOptions, 'enableEnvSubstitution'> = {}
): Promise<Map<string, RetryPolicy>> {
  const manager = new ConfigManager(path, PolicyFileSchema, {
    ...options,
    enableEnvSubstitution: true,
  });
  return buildPolicies(await manager.loadConfig());
}

export function getRetryPolicy(policies: ReadonlyMap<string, RetryPolicy>, name: string): RetryPolicy {
  const policy = policies.get(name);
  if (!policy) {
    const known = [...policies.keys()].join(', ') || 'none';
    throw new ConfigurationError(`Unknown retry policy: ${name}`, {
      code: 'UNKNOWN_POLICY',
      issues: [`Known policies: ${known}`],
    });
  }
  return policy;
}

const previewTarget = (): void => undefined;

/**
 * The first waits a policy would use, with its jitter applied. Stops early where the policy's
 * try limit, time budget or a finite schedule would end the retries; attempts themselves are
 * taken to cost no time.
 */
export function previewWaits(policy: RetryPolicy, count: number): number[] {
  const limit = policy.maxTries === null ? count : Math.min(count, policy.maxTries - 1);
  const sequence = policy.wait.start();
  const waits: number[] = [];
  let elapsedMs = 0;

  for (let tries = 1; tries <= limit; tries++) {
    if (policy.maxTimeMs !== null && elapsedMs >= policy.maxTimeMs) {
      break;
    }
    const record: RetryDetails = { target: previewTarget, targetName: 'preview', args: [], tries, elapsedMs };
    const next = sequence.next(record);
    if (next === undefined) {
      break;
    }
    let waitMs = nonNegative(policy.jitter ? policy.jitter(next) : next);
    if (policy.maxTimeMs !== null) {
      waitMs = Math.min(waitMs, policy.maxTimeMs - elapsedMs);
    }
    waits.push(waitMs);
    elapsedMs += waitMs;
  }

  return waits;
}
