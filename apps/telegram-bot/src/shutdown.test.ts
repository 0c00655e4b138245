import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ShutdownSignal } from '@torrent-relay/core';
import { watchShutdown } from './shutdown.js';

describe('watchShutdown', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should call back once within one polling interval of a request', () => {
    const signal = new ShutdownSignal();
    const onShutdown = vi.fn();
    watchShutdown(signal, 1000, onShutdown);

    vi.advanceTimersByTime(2000);
    expect(onShutdown).not.toHaveBeenCalled();

    signal.requestShutdown();
    vi.advanceTimersByTime(1000);
    expect(onShutdown).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(5000);
    expect(onShutdown).toHaveBeenCalledTimes(1);
  });

  it('should stop polling when cancelled', () => {
    const signal = new ShutdownSignal();
    const onShutdown = vi.fn();
    const stop = watchShutdown(signal, 1000, onShutdown);

    stop();
    signal.requestShutdown();
    vi.advanceTimersByTime(5000);

    expect(onShutdown).not.toHaveBeenCalled();
  });
});
