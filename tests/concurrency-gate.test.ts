import { ConcurrencyGate } from '../src/services/concurrency-gate';
import { InvalidConfigurationError } from '../src/utils/errors';

const delay = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

describe('ConcurrencyGate', () => {
  describe('constructor', () => {
    it('rejects a limit of 0', () => {
      expect(() => new ConcurrencyGate(0)).toThrow(InvalidConfigurationError);
    });

    it('rejects a non-integer limit', () => {
      expect(() => new ConcurrencyGate(1.5)).toThrow('Invalid concurrency value "1.5"');
    });

    it('starts with no holders or waiters', () => {
      const gate = new ConcurrencyGate(3);
      expect(gate.limit).toBe(3);
      expect(gate.active).toBe(0);
      expect(gate.waiting).toBe(0);
      expect(gate.peak).toBe(0);
    });
  });

  describe('acquire() / release()', () => {
    it('admits up to the limit immediately and queues the rest', async () => {
      const gate = new ConcurrencyGate(2);
      await gate.acquire();
      await gate.acquire();

      let thirdAdmitted = false;
      const third = gate.acquire().then(() => {
        thirdAdmitted = true;
      });
      await delay(0);

      expect(gate.active).toBe(2);
      expect(gate.waiting).toBe(1);
      expect(thirdAdmitted).toBe(false);

      gate.release();
      await third;

      expect(thirdAdmitted).toBe(true);
      expect(gate.active).toBe(2);
      expect(gate.waiting).toBe(0);
    });

    it('admits waiters in FIFO order', async () => {
      const gate = new ConcurrencyGate(1);
      await gate.acquire();

      const admitted: string[] = [];
      const waiters = ['a', 'b', 'c'].map((name) =>
        gate.acquire().then(() => {
          admitted.push(name);
        }),
      );

      gate.release();
      await waiters[0];
      gate.release();
      await waiters[1];
      gate.release();
      await waiters[2];

      expect(admitted).toEqual(['a', 'b', 'c']);
      gate.release();
      expect(gate.active).toBe(0);
    });

    it('throws when releasing without a held permit', () => {
      const gate = new ConcurrencyGate(1);
      expect(() => gate.release()).toThrow('called without a held permit');
    });
  });

  describe('withPermit()', () => {
    it('returns the task result and releases the permit', async () => {
      const gate = new ConcurrencyGate(1);
      await expect(gate.withPermit(async () => 42)).resolves.toBe(42);
      expect(gate.active).toBe(0);
    });

    it('releases the permit when the task rejects', async () => {
      const gate = new ConcurrencyGate(1);
      await expect(
        gate.withPermit(async () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');
      expect(gate.active).toBe(0);

      // The gate is still usable afterwards
      await expect(gate.withPermit(async () => 'next')).resolves.toBe('next');
    });

    it('never lets more than `limit` tasks hold the gate', async () => {
      const LIMIT = 3;
      const gate = new ConcurrencyGate(LIMIT);
      let current = 0;
      let observedPeak = 0;

      await Promise.all(
        Array.from({ length: 20 }, () =>
          gate.withPermit(async () => {
            current++;
            if (current > observedPeak) observedPeak = current;
            await delay(5);
            current--;
          }),
        ),
      );

      expect(observedPeak).toBe(LIMIT);
      expect(gate.peak).toBe(LIMIT);
      expect(gate.active).toBe(0);
    });
  });
});
