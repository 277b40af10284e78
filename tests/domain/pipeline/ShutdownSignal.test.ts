import { ShutdownSignal } from '../../../src/domain/pipeline/ShutdownSignal';

describe('ShutdownSignal', () => {
  test('trigger flips the running flag once and keeps the first reason', () => {
    const signal = new ShutdownSignal();
    expect(signal.running).toBe(true);

    expect(signal.trigger('SIGINT')).toBe(true);
    expect(signal.trigger('SIGTERM')).toBe(false);

    expect(signal.running).toBe(false);
    expect(signal.reason).toBe('SIGINT');
  });

  test('notifies listeners once, and immediately when registered late', () => {
    const signal = new ShutdownSignal();
    const early = jest.fn();
    const removed = jest.fn();
    signal.onShutdown(early);
    const off = signal.onShutdown(removed);
    off();

    signal.trigger('done');
    signal.trigger('again');

    const late = jest.fn();
    signal.onShutdown(late);

    expect(early).toHaveBeenCalledTimes(1);
    expect(early).toHaveBeenCalledWith('done');
    expect(removed).not.toHaveBeenCalled();
    expect(late).toHaveBeenCalledWith('done');
  });

  test('sleep resolves early when the signal fires', async () => {
    jest.useFakeTimers();
    try {
      const signal = new ShutdownSignal();
      const woke = jest.fn();
      const sleeping = signal.sleep(60_000).then(woke);

      await Promise.resolve();
      expect(woke).not.toHaveBeenCalled();

      signal.trigger();
      await sleeping;
      expect(woke).toHaveBeenCalled();
      expect(jest.getTimerCount()).toBe(0);
    } finally {
      jest.useRealTimers();
    }
  });

  test('sleep resolves after the delay while running', async () => {
    jest.useFakeTimers();
    try {
      const signal = new ShutdownSignal();
      const woke = jest.fn();
      const sleeping = signal.sleep(100).then(woke);
      jest.advanceTimersByTime(100);
      await sleeping;
      expect(woke).toHaveBeenCalled();
      expect(signal.running).toBe(true);
    } finally {
      jest.useRealTimers();
    }
  });

  test('sleep after shutdown resolves immediately', async () => {
    const signal = new ShutdownSignal();
    signal.trigger();
    await expect(signal.sleep(60_000)).resolves.toBeUndefined();
  });
});
