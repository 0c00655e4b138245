import { describe, it, expect } from 'vitest';
import { ShutdownSignal } from './shutdown.js';

describe('ShutdownSignal', () => {
  it('should start unset', () => {
    expect(new ShutdownSignal().shouldShutdown()).toBe(false);
  });

  it('should stay set once requested', () => {
    const signal = new ShutdownSignal();

    signal.requestShutdown();
    signal.requestShutdown();

    expect(signal.shouldShutdown()).toBe(true);
  });
});
