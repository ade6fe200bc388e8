import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BurstScheduler } from '../../../src/lib/scheduler/burst-scheduler.js';
import { CancelledError, ConfigError } from '../../../src/utils/errors.js';

describe('BurstScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should be disabled without a sleep time', async () => {
    const scheduler = new BurstScheduler({ sleepTimeMs: 0, generateTimeMs: 1000 }, 0);
    expect(scheduler.enabled).toBe(false);
    expect(scheduler.phase(5000)).toBe('generating');
    await expect(scheduler.wait(undefined, 5000)).resolves.toBeUndefined();
  });

  it('should start inside a generating window', () => {
    const scheduler = new BurstScheduler({ sleepTimeMs: 100, generateTimeMs: 150 }, 0);
    expect(scheduler.currentWindowEnd).toBe(150);
    expect(scheduler.phase(0)).toBe('generating');
    expect(scheduler.phase(149)).toBe('generating');
    expect(scheduler.phase(150)).toBe('sleeping');
    expect(scheduler.phase(249)).toBe('sleeping');
    expect(scheduler.phase(250)).toBe('generating');
    expect(scheduler.phase(400)).toBe('sleeping');
  });

  it('should pass through during the generating window', async () => {
    const scheduler = new BurstScheduler({ sleepTimeMs: 100, generateTimeMs: 150 }, 0);
    await scheduler.wait(undefined, 120);
    expect(scheduler.currentWindowEnd).toBe(150);
  });

  it('should sleep until the next window starts', async () => {
    const scheduler = new BurstScheduler({ sleepTimeMs: 100, generateTimeMs: 150 }, 0);
    vi.setSystemTime(150);

    let done = false;
    const pending = scheduler.wait().then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(99);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;

    expect(done).toBe(true);
    expect(Date.now()).toBe(250);
    expect(scheduler.currentWindowEnd).toBe(400);
  });

  it('should not block again inside the new window', async () => {
    const scheduler = new BurstScheduler({ sleepTimeMs: 100, generateTimeMs: 150 }, 0);
    vi.setSystemTime(150);
    const pending = scheduler.wait();
    await vi.advanceTimersByTimeAsync(100);
    await pending;

    await scheduler.wait(undefined, 300);
    expect(scheduler.currentWindowEnd).toBe(400);
  });

  it('should catch up over several missed cycles', async () => {
    const scheduler = new BurstScheduler({ sleepTimeMs: 100, generateTimeMs: 150 }, 0);
    // 150 + 4 * 250 = 1150 is the first window end past 1000
    await scheduler.wait(undefined, 1000);
    expect(scheduler.currentWindowEnd).toBe(1150);
  });

  it('should sleep the remainder when resuming mid-sleep', async () => {
    const scheduler = new BurstScheduler({ sleepTimeMs: 100, generateTimeMs: 150 }, 0);
    vi.setSystemTime(1180);

    const pending = scheduler.wait();
    await vi.advanceTimersByTimeAsync(70);
    await pending;

    expect(Date.now()).toBe(1250);
    expect(scheduler.currentWindowEnd).toBe(1400);
  });

  it('should honour sleep times longer than one timer can hold', async () => {
    const sleepTimeMs = 30 * 24 * 60 * 60 * 1000;
    const scheduler = new BurstScheduler({ sleepTimeMs, generateTimeMs: 1 }, 0);
    vi.setSystemTime(1);

    let done = false;
    const pending = scheduler.wait().then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(sleepTimeMs - 1);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;

    expect(done).toBe(true);
    expect(Date.now()).toBe(sleepTimeMs + 1);
  });

  it('should reject with CancelledError when aborted while sleeping', async () => {
    const scheduler = new BurstScheduler({ sleepTimeMs: 100, generateTimeMs: 150 }, 0);
    vi.setSystemTime(150);

    const controller = new AbortController();
    const pending = scheduler.wait(controller.signal);
    await vi.advanceTimersByTimeAsync(10);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('should reject invalid timings', () => {
    expect(() => new BurstScheduler({ sleepTimeMs: -1, generateTimeMs: 100 })).toThrow(ConfigError);
    expect(() => new BurstScheduler({ sleepTimeMs: 100, generateTimeMs: 0 })).toThrow(ConfigError);
  });
});
