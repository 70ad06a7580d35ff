import { Logger, LoggerFactory, LogLevel, type LogEntry, type LogTransport } from '@rebound/logging';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { onException, onPredicate } from '../decorators.js';
import { CooperativeSuspender, MAX_TIMER_MS } from '../drivers.js';
import { DEFAULT_LOGGER_NAME } from '../handlers.js';
import type { AsyncSuspender } from '../types.js';
import { constant, expo, runtime } from '../wait-generators.js';

class TransientError extends Error {
  constructor(
    message: string,
    public readonly retryAfterMs = 0
  ) {
    super(message);
    this.name = 'TransientError';
  }
}

class RecordingSuspender implements AsyncSuspender {
  public readonly waits: number[] = [];

  async suspend(waitMs: number): Promise<void> {
    this.waits.push(waitMs);
  }
}

class CaptureTransport implements LogTransport {
  public readonly name = 'capture';
  public readonly entries: LogEntry[] = [];

  constructor(private readonly events: string[] = []) {}

  async log(entry: LogEntry): Promise<void> {
    this.entries.push(entry);
    this.events.push(`log:${entry.message}`);
  }
}

/**
 * Target failing with the given errors in turn, then returning `value`
 */
function failing<T>(errors: unknown[], value: T) {
  let calls = 0;
  const target = vi.fn(async (_id: string): Promise<T> => {
    const error = errors[calls++];
    if (error !== undefined) {
      throw error;
    }
    return value;
  });
  return target;
}

describe('onException', () => {
  it('should return the value after retrying k failures', async () => {
    const suspender = new RecordingSuspender();
    const target = failing([new TransientError('a'), new TransientError('b')], 'user-1');
    const onBackoff = vi.fn();
    const onSuccess = vi.fn();

    const fetchUser = onException(target, {
      retryOn: TransientError,
      wait: constant({ intervalMs: 100 }),
      jitter: null,
      maxTries: 3,
      logger: null,
      onBackoff,
      onSuccess,
      suspender,
    });

    await expect(fetchUser('1')).resolves.toBe('user-1');
    expect(target).toHaveBeenCalledTimes(3);
    expect(target).toHaveBeenCalledWith('1');
    expect(onBackoff).toHaveBeenCalledTimes(2);
    expect(onSuccess).toHaveBeenCalledTimes(1);
    expect(onSuccess).toHaveBeenCalledWith(expect.objectContaining({ tries: 3, value: 'user-1', args: ['1'] }));
    expect(suspender.waits).toEqual([100, 100]);
  });

  it('should rethrow the last error unchanged after max tries', async () => {
    const errors = [new TransientError('1'), new TransientError('2'), new TransientError('3')];
    const target = failing(errors, 'never');
    const onGiveup = vi.fn();

    const fetchUser = onException(target, {
      retryOn: TransientError,
      maxTries: 3,
      logger: null,
      onGiveup,
      suspender: new RecordingSuspender(),
    });

    await expect(fetchUser('1')).rejects.toBe(errors[2]);
    expect(target).toHaveBeenCalledTimes(3);
    expect(onGiveup).toHaveBeenCalledTimes(1);
    expect(onGiveup).toHaveBeenCalledWith(expect.objectContaining({ tries: 3, error: errors[2] }));
  });

  it('should stop at once on errors it does not retry', async () => {
    const error = new TypeError('bad id');
    const target = failing([error], 'never');
    const handler = vi.fn();

    const fetchUser = onException(target, {
      retryOn: TransientError,
      logger: null,
      onBackoff: handler,
      onGiveup: handler,
      onSuccess: handler,
      suspender: new RecordingSuspender(),
    });

    await expect(fetchUser('1')).rejects.toBe(error);
    expect(target).toHaveBeenCalledTimes(1);
    expect(handler).not.toHaveBeenCalled();
  });

  it('should give up after one attempt when giveup matches', async () => {
    const error = new TransientError('account closed');
    const target = failing([error, error], 'never');
    const onGiveup = vi.fn();

    const fetchUser = onException(target, {
      retryOn: TransientError,
      giveup: caught => caught instanceof TransientError && caught.message === 'account closed',
      logger: null,
      onGiveup,
      suspender: new RecordingSuspender(),
    });

    await expect(fetchUser('1')).rejects.toBe(error);
    expect(target).toHaveBeenCalledTimes(1);
    expect(onGiveup).toHaveBeenCalledTimes(1);
  });

  it('should resolve to undefined on give-up when asked not to raise', async () => {
    const fetchUser = onException(failing([new TransientError('x')], 'never'), {
      retryOn: [RangeError, TransientError],
      maxTries: 1,
      raiseOnGiveup: false,
      logger: null,
    });

    await expect(fetchUser('1')).resolves.toBeUndefined();
  });

  it('should start every call from the beginning of the schedule', async () => {
    const suspender = new RecordingSuspender();
    const fetchUser = onException(
      async (_id: string): Promise<string> => {
        throw new TransientError('down');
      },
      {
        retryOn: TransientError,
        wait: expo({ baseMs: 100 }),
        jitter: null,
        maxTries: 3,
        logger: null,
        suspender,
      }
    );

    await expect(fetchUser('1')).rejects.toThrow('down');
    await expect(fetchUser('2')).rejects.toThrow('down');
    expect(suspender.waits).toEqual([100, 200, 100, 200]);
  });

  it('should wait as long as the error asks with a runtime schedule', async () => {
    const suspender = new RecordingSuspender();
    const fetchUser = onException(failing([new TransientError('throttled', 250)], 'user-1'), {
      retryOn: TransientError,
      wait: runtime({
        value: details => (details.error instanceof TransientError ? details.error.retryAfterMs : 0),
      }),
      jitter: null,
      logger: null,
      suspender,
    });

    await expect(fetchUser('1')).resolves.toBe('user-1');
    expect(suspender.waits).toEqual([250]);
  });

  it('should give up once the time budget is spent', async () => {
    vi.useFakeTimers({ toFake: ['performance'] });
    const suspender: AsyncSuspender = {
      suspend: async waitMs => {
        vi.advanceTimersByTime(waitMs);
      },
    };
    const waits: (number | undefined)[] = [];
    const target = vi.fn((_id: string): string => {
      vi.advanceTimersByTime(600);
      throw new TransientError('slow');
    });

    const fetchUser = onException(target, {
      retryOn: TransientError,
      wait: constant({ intervalMs: 800 }),
      jitter: null,
      maxTimeMs: 1000,
      logger: null,
      onBackoff: details => {
        waits.push(details.waitMs);
      },
      suspender,
    });

    try {
      await expect(fetchUser('1')).rejects.toThrow('slow');
      expect(target).toHaveBeenCalledTimes(2);
      expect(waits).toEqual([400]);
    } finally {
      vi.useRealTimers();
    }
  });

  it('should run handlers in order and await each one', async () => {
    const events: string[] = [];
    const logger = new Logger({ component: 'test', level: LogLevel.DEBUG, transports: [new CaptureTransport(events)] });

    let calls = 0;
    async function fetchUser(_id: string): Promise<string> {
      if (calls++ === 0) {
        throw new TransientError('busy');
      }
      return 'user-1';
    }

    const wrapped = onException(fetchUser, {
      retryOn: TransientError,
      wait: constant({ intervalMs: 0 }),
      logger,
      onBackoff: [
        async () => {
          await new Promise(resolve => setTimeout(resolve, 5));
          events.push('first');
        },
        () => {
          events.push('second');
        },
      ],
      onSuccess: () => {
        events.push('success');
      },
      suspender: new RecordingSuspender(),
    });

    await expect(wrapped('1')).resolves.toBe('user-1');

    expect(events).toEqual([
      'log:Backing off fetchUser(...) for 0.0s (TransientError: busy)',
      'first',
      'second',
      'success',
    ]);
  });

  it('should end the call when a handler throws', async () => {
    const target = failing([new TransientError('busy')], 'user-1');
    const broken = new Error('handler failed');

    const fetchUser = onException(target, {
      retryOn: TransientError,
      logger: null,
      onBackoff: () => {
        throw broken;
      },
      suspender: new RecordingSuspender(),
    });

    await expect(fetchUser('1')).rejects.toBe(broken);
    expect(target).toHaveBeenCalledTimes(1);
  });

  it('should keep the name of the target', () => {
    async function loadProfile(id: string): Promise<string> {
      return id;
    }

    expect(onException(loadProfile, { retryOn: Error }).name).toBe('loadProfile');
  });

  it('should accept synchronous targets', async () => {
    let calls = 0;
    const parse = onException(
      (input: string): number => {
        if (calls++ === 0) {
          throw new TransientError('locked');
        }
        return input.length;
      },
      { retryOn: TransientError, logger: null, suspender: new RecordingSuspender() }
    );

    await expect(parse('abc')).resolves.toBe(3);
  });
});

describe('onPredicate', () => {
  it('should retry until the predicate is satisfied', async () => {
    const values = [1, 1, 2];
    const target = vi.fn((): number => values.shift() ?? 0);

    const poll = onPredicate(target, {
      predicate: value => value !== 2,
      jitter: null,
      logger: null,
      suspender: new RecordingSuspender(),
    });

    await expect(poll()).resolves.toBe(2);
    expect(target).toHaveBeenCalledTimes(3);
  });

  it('should return the last value on give-up', async () => {
    const poll = onPredicate(async (): Promise<string | null> => null, {
      maxTries: 2,
      logger: null,
      suspender: new RecordingSuspender(),
    });

    await expect(poll()).resolves.toBeNull();
  });

  it('should not retry errors', async () => {
    const error = new TransientError('offline');
    const target = vi.fn(async (): Promise<boolean> => {
      throw error;
    });

    await expect(onPredicate(target, { logger: null })()).rejects.toBe(error);
    expect(target).toHaveBeenCalledTimes(1);
  });
});

describe('retry logging', () => {
  afterEach(() => {
    LoggerFactory.setLogger(DEFAULT_LOGGER_NAME, LoggerFactory.createConsoleLogger(DEFAULT_LOGGER_NAME, LogLevel.WARN));
  });

  it('should log backoff and give-up lines with the configured levels', async () => {
    const transport = new CaptureTransport();
    const logger = new Logger({ component: 'client', level: LogLevel.DEBUG, transports: [transport] });
    const error = new TransientError('socket hang up');
    const fetchUser = async (_id: string): Promise<string> => {
      throw error;
    };

    const wrapped = onException(fetchUser, {
      retryOn: TransientError,
      wait: constant({ intervalMs: 1500 }),
      jitter: null,
      maxTries: 2,
      logger,
      backoffLogLevel: LogLevel.WARN,
      suspender: new RecordingSuspender(),
    });

    await expect(wrapped('1')).rejects.toBe(error);

    expect(transport.entries.map(entry => [entry.level, entry.message])).toEqual([
      [LogLevel.WARN, 'Backing off fetchUser(...) for 1.5s (TransientError: socket hang up)'],
      [LogLevel.ERROR, 'Giving up fetchUser(...) after 2 tries (TransientError: socket hang up)'],
    ]);
    expect(transport.entries[1]?.error).toBe(error);
    expect(transport.entries[0]?.data).toEqual({ tries: 1, elapsedMs: expect.any(Number), waitMs: 1500 });
  });

  it('should describe unsatisfactory values in predicate mode', async () => {
    const transport = new CaptureTransport();
    const logger = new Logger({ component: 'client', level: LogLevel.INFO, transports: [transport] });
    const statuses = ['pending', 'ready'];
    const pollJob = (): string => statuses.shift() ?? 'ready';

    await onPredicate(pollJob, {
      predicate: status => status === 'pending',
      wait: constant({ intervalMs: 500 }),
      jitter: null,
      logger,
      suspender: new RecordingSuspender(),
    })();

    expect(transport.entries.map(entry => entry.message)).toEqual(["Backing off pollJob(...) for 0.5s ('pending')"]);
  });

  it('should use the shared rebound logger by default', async () => {
    const transport = new CaptureTransport();
    LoggerFactory.setLogger(
      DEFAULT_LOGGER_NAME,
      new Logger({ component: DEFAULT_LOGGER_NAME, level: LogLevel.INFO, transports: [transport] })
    );
    const syncOrders = (): boolean => false;

    await onPredicate(syncOrders, { maxTries: 1, suspender: new RecordingSuspender() })();

    expect(transport.entries.map(entry => entry.message)).toEqual(['Giving up syncOrders(...) after 1 tries (false)']);
  });

  it('should not log when the logger is disabled', async () => {
    const transport = new CaptureTransport();
    LoggerFactory.setLogger(
      DEFAULT_LOGGER_NAME,
      new Logger({ component: DEFAULT_LOGGER_NAME, level: LogLevel.DEBUG, transports: [transport] })
    );

    await onPredicate((): number => 0, { maxTries: 2, logger: null, suspender: new RecordingSuspender() })();

    expect(transport.entries).toEqual([]);
  });
});

describe('CooperativeSuspender', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should chain timers for waits longer than one timer holds', async () => {
    vi.useFakeTimers();
    const setTimeoutSpy = vi.spyOn(globalThis, 'setTimeout');
    let done = false;

    const pending = new CooperativeSuspender().suspend(MAX_TIMER_MS + 1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(MAX_TIMER_MS);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1000);
    await pending;

    expect(done).toBe(true);
    expect(setTimeoutSpy).toHaveBeenCalledWith(expect.any(Function), MAX_TIMER_MS);
    expect(setTimeoutSpy).toHaveBeenCalledWith(expect.any(Function), 1000);
  });

  it('should resolve at once for zero waits', async () => {
    await expect(new CooperativeSuspender().suspend(0)).resolves.toBeUndefined();
  });
});
