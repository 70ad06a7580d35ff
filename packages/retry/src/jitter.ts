/**
 * Jitter functions: randomize a wait so that many callers do not retry in lockstep
 */

import { ConfigurationError } from '@rebound/errors';

import type { Jitterer } from './types.js';

/**
 * Uniformly random wait in `[0, waitMs)`
 */
export const fullJitter: Jitterer = waitMs => Math.random() * Math.max(0, waitMs);

/**
 * Jitter that keeps the raw wait as a floor and adds up to `fraction * waitMs` on top of it
 */
export function createRandomJitter(fraction = 1): Jitterer {
  if (!Number.isFinite(fraction) || fraction < 0) {
    throw new ConfigurationError('Invalid random jitter', {
      issues: [`fraction: expected a finite number >= 0, received ${fraction}`],
    });
  }

  return waitMs => {
    const base = Math.max(0, waitMs);
    return base + Math.random() * fraction * base;
  };
}

/**
 * `waitMs + uniform(0, waitMs)`
 */
export const randomJitter: Jitterer = createRandomJitter(1);
