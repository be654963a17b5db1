/**
 * Timeout Utility Tests
 */

import { TimeoutError, withAbort, withTimeout } from './timeout';
import logger from './logger';

const never = (): Promise<string> => new Promise<string>(() => undefined);

describe('timeout', () => {
  describe('withTimeout', () => {
    afterEach(() => {
      jest.useRealTimers();
    });

    it('should resolve with the operation result', async () => {
      await expect(withTimeout(Promise.resolve('done'), 1000)).resolves.toBe('done');
    });

    it('should pass the operation error through', async () => {
      await expect(withTimeout(Promise.reject(new Error('refused')), 1000)).rejects.toThrow('refused');
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should reject with a TimeoutError and log it', async () => {
      const pending = withTimeout(never(), 10, 'Reverse geocode');

      await expect(pending).rejects.toThrow(new TimeoutError('Reverse geocode timed out (10ms)', 10));
      await expect(pending).rejects.toMatchObject({ code: 'TIMEOUT', timeout: 10 });
      expect(logger.warn).toHaveBeenCalledWith('⏱️ Timeout occurred', {
        operation: 'Reverse geocode',
        timeout: 10,
        error: 'Reverse geocode timed out (10ms)'
      });
    });

    it('should clear its timer once the operation settles', async () => {
      jest.useFakeTimers();

      await withTimeout(Promise.resolve(1), 60000);

      expect(jest.getTimerCount()).toBe(0);
    });

    it('should clear its timer when the signal aborts', () => {
      jest.useFakeTimers();
      const controller = new AbortController();

      void withTimeout(never(), 60000, null, controller.signal);
      expect(jest.getTimerCount()).toBe(1);

      controller.abort();
      expect(jest.getTimerCount()).toBe(0);
    });
  });

  describe('withAbort', () => {
    const cancelled = (): Error => new Error('cancelled');

    it('should return the promise untouched without a signal', () => {
      const promise = Promise.resolve('value');

      expect(withAbort(promise, undefined, cancelled)).toBe(promise);
    });

    it('should reject at once for an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(withAbort(never(), controller.signal, cancelled)).rejects.toThrow('cancelled');
    });

    it('should reject when the signal aborts before the promise settles', async () => {
      const controller = new AbortController();
      const pending = withAbort(never(), controller.signal, cancelled);

      controller.abort();

      await expect(pending).rejects.toThrow('cancelled');
    });

    it('should settle with the promise when no abort happens', async () => {
      const controller = new AbortController();

      await expect(withAbort(Promise.resolve(7), controller.signal, cancelled)).resolves.toBe(7);
      await expect(withAbort(Promise.reject(new Error('boom')), controller.signal, cancelled)).rejects.toThrow('boom');
    });
  });
});
