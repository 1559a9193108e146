export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

export type ShutdownEvent =
  | { kind: 'signal'; signal: NodeJS.Signals }
  | { kind: 'server-terminated'; error: Error | null };

/**
 * Single consumer queue fed by the signal handler and the server task. Events
 * are delivered in arrival order, each exactly once.
 */
export class ShutdownEvents {
  private readonly queue: ShutdownEvent[] = [];
  private waiter: ((event: ShutdownEvent) => void) | undefined;

  push(event: ShutdownEvent): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(event);
      return;
    }
    this.queue.push(event);
  }

  next(): Promise<ShutdownEvent> {
    const queued = this.queue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }
}

export type SignalHandler = (signal: NodeJS.Signals) => void;

export interface SignalSource {
  /** Returns a function removing the handler. */
  subscribe(signals: readonly NodeJS.Signals[], handler: SignalHandler): () => void;
}

export const processSignals: SignalSource = {
  subscribe(signals, handler) {
    for (const signal of signals) {
      process.on(signal, handler);
    }
    return () => {
      for (const signal of signals) {
        process.off(signal, handler);
      }
    };
  },
};
