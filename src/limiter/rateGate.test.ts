import { pino } from 'pino';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../error/configurationError.js';
import { LimitReachedError } from '../error/limitReachedError.js';
import { RetryExhaustedError } from '../error/retryExhaustedError.js';
import { RateGate } from './rateGate.js';

const silent = pino({ level: 'silent' });

describe('RateGate', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('construction', () => {
    it.each([0, -1, 1.5, Number.NaN])('rejects requestsPerMinute of %d', (requestsPerMinute) => {
      expect(() => new RateGate({ requestsPerMinute, logger: silent })).toThrow(ConfigurationError);
    });

    it('rejects a fractional maxRetries', () => {
      expect(() => new RateGate({ requestsPerMinute: 1, maxRetries: 0.5, logger: silent })).toThrow(
        ConfigurationError,
      );
    });

    it('accepts the smallest legal rate', () => {
      expect(new RateGate({ requestsPerMinute: 1, logger: silent }).limit).toBe(1);
    });
  });

  describe('check', () => {
    it('records admissions until the window is full', () => {
      const gate = new RateGate({ requestsPerMinute: 2, logger: silent });

      expect(gate.check()).toBe(0);
      expect(gate.check()).toBe(0);
      expect(gate.used).toBe(2);
      expect(() => gate.check()).toThrow(LimitReachedError);
    });

    it('reports when the oldest admission leaves the window', () => {
      const gate = new RateGate({ requestsPerMinute: 1, logger: silent });
      gate.check();
      vi.setSystemTime(15_000);

      try {
        gate.check();
        expect.unreachable('window should be full');
      } catch (err) {
        expect(err).toBeInstanceOf(LimitReachedError);
        expect(err instanceof LimitReachedError && err.retryIn).toBe(45_000);
      }
    });

    it('frees a slot once an admission is a full period old', () => {
      const gate = new RateGate({ requestsPerMinute: 1, logger: silent });
      gate.check();

      vi.setSystemTime(59_999);
      expect(() => gate.check()).toThrow(LimitReachedError);

      vi.setSystemTime(60_000);
      expect(gate.check()).toBe(60_000);
    });
  });

  describe('admit', () => {
    it('admits immediately while the window has room', async () => {
      const gate = new RateGate({ requestsPerMinute: 2, logger: silent });

      expect(await gate.admit()).toEqual([null, 0]);
      expect(await gate.admit()).toEqual([null, 0]);
    });

    it('holds the (N+1)th admission until the oldest is 60 seconds old', async () => {
      const gate = new RateGate({ requestsPerMinute: 2, logger: silent });
      await gate.admit();
      await gate.admit();

      let settled = false;
      const third = gate.admit().then((result) => {
        settled = true;
        return result;
      });

      await vi.advanceTimersByTimeAsync(59_000);
      expect(settled).toBe(false);

      await vi.advanceTimersByTimeAsync(1_000);
      expect(await third).toEqual([null, 60_000]);
    });

    it('retries after unrelated errors raised by the check', async () => {
      class FlakyGate extends RateGate {
        failures = 2;

        check(): number {
          if (this.failures > 0) {
            this.failures -= 1;
            throw new TypeError('limiter state glitch');
          }

          return super.check();
        }
      }

      const gate = new FlakyGate({ requestsPerMinute: 5, logger: silent });
      const admitted = gate.admit();

      await vi.advanceTimersByTimeAsync(2_000);
      expect(await admitted).toEqual([null, 2_000]);
    });

    it('gives up after maxRetries with the last failure as cause', async () => {
      const gate = new RateGate({ requestsPerMinute: 1, maxRetries: 2, logger: silent });
      await gate.admit();

      const pending = gate.admit();
      await vi.advanceTimersByTimeAsync(2_000);
      const [err, admittedAt] = await pending;

      expect(admittedAt).toBeNull();
      expect(err).toBeInstanceOf(RetryExhaustedError);
      expect(err?.attempts).toBe(3);
      expect(err?.cause).toBeInstanceOf(LimitReachedError);
    });

    it('logs a warning when a wait begins and debug lines on rechecks', async () => {
      const logger = pino({ level: 'silent' });
      const warn = vi.spyOn(logger, 'warn');
      const debug = vi.spyOn(logger, 'debug');
      const gate = new RateGate({ requestsPerMinute: 1, retryInterval: 100, logger });
      await gate.admit();

      const pending = gate.admit();
      await vi.advanceTimersByTimeAsync(200);

      expect(warn).toHaveBeenCalledOnce();
      expect(warn).toHaveBeenCalledWith(
        { reason: 'error rate limit of 1 requests reached, window frees up in 60000ms', retryInterval: 100 },
        'rate gate full, waiting for admission',
      );
      expect(debug).toHaveBeenCalledWith(
        { attempt: 2, reason: 'error rate limit of 1 requests reached, window frees up in 59900ms' },
        'rate gate recheck',
      );

      await vi.advanceTimersByTimeAsync(60_000);
      expect(await pending).toEqual([null, 60_000]);
    });
  });
});
