import { ConfigurationError } from '@rebound/errors';
import { describe, expect, it, vi } from 'vitest';

import { createRandomJitter, fullJitter, randomJitter } from '../jitter.js';

describe('jitter', () => {
  it('should pick full jitter uniformly below the wait', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.25);

    expect(fullJitter(1000)).toBe(250);
    expect(fullJitter(-5)).toBe(0);
  });

  it('should add random jitter on top of the wait', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.25);

    expect(randomJitter(1000)).toBe(1250);
    expect(createRandomJitter(0.5)(1000)).toBe(1125);
    expect(createRandomJitter(0)(1000)).toBe(1000);
  });

  it('should reject unusable fractions', () => {
    expect(() => createRandomJitter(-1)).toThrow(ConfigurationError);
    expect(() => createRandomJitter(Number.POSITIVE_INFINITY)).toThrow('Invalid random jitter');
  });
});
