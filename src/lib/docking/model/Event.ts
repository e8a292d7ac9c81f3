export interface IDisposable {
  dispose(): void;
}

/** Subscribe function handed to consumers; the result unsubscribes. */
export type Event<T> = (listener: (e: T) => void) => IDisposable;

/**
 * Owner side of an `Event<T>`. Each subscription is its own entry, so the
 * same function subscribed twice is notified twice and disposed separately.
 */
export class Emitter<T> {
  private subscriptions = new Set<{ listener: (e: T) => void }>();

  readonly event: Event<T> = (listener) => {
    const subscription = { listener };
    this.subscriptions.add(subscription);
    return { dispose: () => this.subscriptions.delete(subscription) };
  };

  /** Listeners added during a fire wait for the next one. */
  fire(event: T): void {
    for (const { listener } of [...this.subscriptions]) {
      listener(event);
    }
  }

  get listenerCount(): number {
    return this.subscriptions.size;
  }

  dispose(): void {
    this.subscriptions.clear();
  }
}
