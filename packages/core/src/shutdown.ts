/**
 * Cooperative Shutdown Signal
 * 
 * One-way flag owned by the process controller. Handlers request a
 * shutdown, a background poller observes it. Once set it stays set.
 */

export class ShutdownSignal {
  private requested = false;

  requestShutdown(): void {
    this.requested = true;
  }

  shouldShutdown(): boolean {
    return this.requested;
  }
}
