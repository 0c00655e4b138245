/**
 * Shutdown Poller
 */

import type { ShutdownSignal } from '@torrent-relay/core';

/**
 * Check the signal every `intervalMs` and call `onShutdown` once it is set.
 * Returns a function that stops polling.
 */
export function watchShutdown(
  signal: ShutdownSignal,
  intervalMs: number,
  onShutdown: () => void
): () => void {
  const timer = setInterval(() => {
    if (signal.shouldShutdown()) {
      clearInterval(timer);
      onShutdown();
    }
  }, intervalMs);

  return () => clearInterval(timer);
}
